import { mkdir, mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { vi } from 'vitest'
import type { Logger } from '../core/logger.js'

export type TreeFiles = Record<string, string | object>

/**
 * Create a temporary directory populated with the given files.
 * Object contents are written as JSON, strings as-is.
 */
export async function makeTree(files: TreeFiles, prefix = 'schemabind-test-'): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), prefix))
  await writeTree(root, files)
  return root
}

export async function writeTree(root: string, files: TreeFiles): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const path = join(root, relative)
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, typeof content === 'string' ? content : JSON.stringify(content), 'utf8')
  }
}

export function createRecordingLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  } satisfies Logger
}

export const ID_DEFINITION = { type: 'integer', minimum: 1 }

export const DEFINITIONS_DOC = {
  $schema: 'http://json-schema.org/draft-04/schema#',
  definitions: { id: ID_DEFINITION },
}

export const METHOD_DOC = {
  type: 'object',
  properties: { id: { $ref: '#/definitions/id' } },
}
