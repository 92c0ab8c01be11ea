import { gzipSync } from 'node:zlib'
import { encode } from '@msgpack/msgpack'
import { describe, expect, it } from 'vitest'
import { decodeArchive, encodeArchive, generateSchemaTs } from './generateSchemaFile.js'
import type { BlobEntry } from './blobStore.js'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

function entry(key: string, text: string): BlobEntry {
  return [key, encoder.encode(text)]
}

describe('encodeArchive', () => {
  it('stores every entry under its key', () => {
    const assets = decodeArchive(encodeArchive([entry('b', '{"type":"string"}'), entry('a', '{}')]))

    expect([...assets.keys()]).toEqual(['a', 'b'])
    expect(decoder.decode(assets.get('b'))).toBe('{"type":"string"}')
  })

  it('does not depend on the order entries arrive in', () => {
    const first = encodeArchive([entry('a', '1'), entry('b', '2'), entry('c', '3')])
    const second = encodeArchive([entry('c', '3'), entry('a', '1'), entry('b', '2')])

    expect(second).toBe(first)
  })

  it('rejects an archive that is not a list of pairs', () => {
    const archive = gzipSync(encode({ create: '{}' })).toString('base64')

    expect(() => decodeArchive(archive)).toThrow('malformed embedded archive')
  })
})

describe('generateSchemaTs', () => {
  it('embeds the archive in fixed-width chunks', () => {
    const entries = Array.from({ length: 20 }, (_, i) => entry(`method${i}`, JSON.stringify({ title: `m${i}`, seed: i * 7919 })))

    const source = generateSchemaTs('users', entries)
    const lines = [...source.matchAll(/^ {2}'([A-Za-z0-9+/=]+)',$/gm)].map((match) => match[1])

    expect(lines.length).toBeGreaterThan(1)
    expect(lines.slice(0, -1).every((line) => line.length === 96)).toBe(true)
    expect(lines.join('')).toBe(encodeArchive(entries))
  })

  it('exports the service name and the asset accessors', () => {
    const source = generateSchemaTs('users', [entry('create', '{}')])

    expect(source.startsWith('// Code generated by schemabind. DO NOT EDIT.\n')).toBe(true)
    expect(source).toContain("export const SERVICE = 'users'")
    expect(source).toContain('export function assetNames(): string[]')
    expect(source).toContain('export function asset(name: string): Uint8Array')
    expect(source).toContain("import { decode } from '@msgpack/msgpack'")
  })

  it('escapes quotes in service names', () => {
    const source = generateSchemaTs("it's", [entry('m', '{}')])

    expect(source).toContain("export const SERVICE = 'it\\'s'")
  })
})
