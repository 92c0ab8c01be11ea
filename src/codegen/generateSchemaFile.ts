// Embedded artifact (schema.ts): every resolved schema of one service packed
// into a single archive string.
//
// Archive layout: MessagePack array of [key, bin] pairs sorted by key,
// gzip-compressed, base64-encoded.

import { gunzipSync, gzipSync } from 'node:zlib'
import { decode, encode } from '@msgpack/msgpack'
import type { BlobEntry } from './blobStore.js'
import { compareNames } from '../core/order.js'
import { quote } from './quote.js'

export const SCHEMA_FILE = 'schema.ts'

const CHUNK_WIDTH = 96

export function encodeArchive(entries: readonly BlobEntry[]): string {
  const pairs = [...entries]
    .sort(([a], [b]) => compareNames(a, b))
    .map(([key, bytes]) => [key, bytes])
  return gzipSync(encode(pairs), { level: 9 }).toString('base64')
}

export function decodeArchive(archive: string): Map<string, Uint8Array> {
  const decoded: unknown = decode(gunzipSync(Buffer.from(archive, 'base64')))
  if (!Array.isArray(decoded)) {
    throw new Error('malformed embedded archive')
  }
  const assets = new Map<string, Uint8Array>()
  for (const entry of decoded) {
    if (!Array.isArray(entry) || typeof entry[0] !== 'string' || !(entry[1] instanceof Uint8Array)) {
      throw new Error('malformed embedded archive entry')
    }
    assets.set(entry[0], entry[1])
  }
  return assets
}

function chunk(value: string, width: number): string[] {
  const chunks: string[] = []
  for (let i = 0; i < value.length; i += width) {
    chunks.push(value.slice(i, i + width))
  }
  return chunks
}

/**
 * Render schema.ts for one service. Exports `SERVICE`, `assetNames()` and `asset(name)`.
 */
export function generateSchemaTs(service: string, entries: readonly BlobEntry[]): string {
  const archive = chunk(encodeArchive(entries), CHUNK_WIDTH)
    .map((line) => `  '${line}',`)
    .join('\n')

  return `// Code generated by schemabind. DO NOT EDIT.

import { gunzipSync } from 'node:zlib'
import { decode } from '@msgpack/msgpack'

export const SERVICE = ${quote(service)}

const ARCHIVE = [
${archive}
].join('')

let assets: Map<string, Uint8Array> | undefined

function loadAssets(): Map<string, Uint8Array> {
  if (assets) {
    return assets
  }
  const decoded: unknown = decode(gunzipSync(Buffer.from(ARCHIVE, 'base64')))
  if (!Array.isArray(decoded)) {
    throw new Error(\`\${SERVICE}: malformed embedded archive\`)
  }
  const loaded = new Map<string, Uint8Array>()
  for (const entry of decoded) {
    if (!Array.isArray(entry) || typeof entry[0] !== 'string' || !(entry[1] instanceof Uint8Array)) {
      throw new Error(\`\${SERVICE}: malformed embedded archive entry\`)
    }
    loaded.set(entry[0], entry[1])
  }
  assets = loaded
  return loaded
}

/** Keys of every embedded schema, sorted. */
export function assetNames(): string[] {
  return [...loadAssets().keys()]
}

/** Raw JSON bytes of one embedded schema. */
export function asset(name: string): Uint8Array {
  const data = loadAssets().get(name)
  if (!data) {
    throw new Error(\`\${SERVICE}: asset \${name} not found\`)
  }
  return data
}
`
}
