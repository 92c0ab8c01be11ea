import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterAll, describe, expect, it } from 'vitest'
import { DEFINITIONS_DOC, ID_DEFINITION, METHOD_DOC, makeTree } from '../test-utils/tree.js'
import { BIND_FILE, generateBindTs } from './generateBindFile.js'
import { SCHEMA_FILE, generateSchemaTs } from './generateSchemaFile.js'
import { runCodegen } from './index.js'

// Generated modules import @msgpack/msgpack, so they must live inside the project to resolve it.
const outputRoot = fileURLToPath(new URL('../../.test-output/', import.meta.url))

async function outputBase(): Promise<string> {
  await mkdir(outputRoot, { recursive: true })
  return mkdtemp(join(outputRoot, 'loader-'))
}

function schemasOf(module: unknown): ReadonlyMap<string, unknown> {
  if (typeof module !== 'object' || module === null || !('Schemas' in module) || !(module.Schemas instanceof Map)) {
    throw new Error('generated module does not export a Schemas map')
  }
  return module.Schemas
}

async function writeService(service: string, entries: [string, string][]): Promise<string> {
  const dir = await outputBase()
  const encoder = new TextEncoder()
  await writeFile(join(dir, SCHEMA_FILE), generateSchemaTs(service, entries.map(([key, text]) => [key, encoder.encode(text)])))
  await writeFile(join(dir, BIND_FILE), generateBindTs(service))
  return join(dir, BIND_FILE)
}

afterAll(async () => {
  await rm(outputRoot, { recursive: true, force: true })
})

describe('generated loader', () => {
  it('publishes resolved schemas keyed by file basename', async () => {
    const input = await makeTree({ 'definitions.json': DEFINITIONS_DOC, 'm.json': METHOD_DOC, 'plain.json': { type: 'string' } })
    const outputDir = join(await outputBase(), 'orders')

    await runCodegen({ input, outputDir })
    const schemas = schemasOf(await import(join(outputDir, BIND_FILE)))

    expect([...schemas.keys()]).toEqual(['m', 'plain'])
    expect(schemas.get('m')).toEqual({ ...METHOD_DOC, definitions: { id: ID_DEFINITION } })
    expect(schemas.get('plain')).toEqual({ type: 'string', definitions: {} })
  })

  it('fails at import when an embedded schema is not valid JSON', async () => {
    const bind = await writeService('orders', [['broken', '{not json']])

    await expect(import(bind)).rejects.toThrow(/^orders: /)
  })

  it('fails at import when an embedded schema is not an object', async () => {
    const bind = await writeService('orders', [['listed', '[1, 2]']])

    await expect(import(bind)).rejects.toThrow('orders: schema listed is not a JSON object')
  })
})
