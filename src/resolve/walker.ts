import { readdir, readFile, stat } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { DefinitionsNotFoundError, SchemaHasDefinitionsError, SchemaParseError, errorMessage } from '../core/errors.js'
import { hasOwn, isJsonObject } from '../core/json.js'
import { NoOpLogger, type Logger } from '../core/logger.js'
import { compareNames } from '../core/order.js'
import { resolveDocumentDefinitions } from './closure.js'
import { DEFINITIONS_FILE, DEFINITIONS_KEY, isNotFound, loadDefinitionPool, type DefinitionPool } from './definitions.js'

/** Receives every resolved schema. PartitionRouter is the production sink. */
export interface SchemaSink {
  route(originPath: string, bytes: Uint8Array): Promise<unknown>
}

export interface WalkOptions {
  sink: SchemaSink
  logger?: Logger
}

export interface WalkResult {
  /** Pool active for the walked tree, if its root had one. */
  pool: DefinitionPool | undefined
  /** Schema files resolved and routed, in visit order. */
  schemas: string[]
  /** Subdirectories skipped because they carry their own definitions file. */
  shadowed: string[]
}

/** The pool active for a subtree. Passed down the recursion, never shared. */
interface Scope {
  readonly root: string
  readonly pool: DefinitionPool | undefined
}

interface WalkContext {
  readonly sink: SchemaSink
  readonly logger: Logger
  readonly result: WalkResult
}

const encoder = new TextEncoder()

/**
 * Resolve every schema under `root` against the root's definitions and route it.
 *
 * Subdirectories holding their own definitions.json are skipped with all their
 * content: each such subtree is generated by its own run. Entries are visited
 * depth-first in lexical order. The first error aborts the walk.
 */
export async function walkSchemaTree(root: string, options: WalkOptions): Promise<WalkResult> {
  const logger = options.logger ?? new NoOpLogger()
  const pool = await loadAmbientPool(root, logger)
  const context: WalkContext = {
    sink: options.sink,
    logger,
    result: { pool, schemas: [], shadowed: [] },
  }

  await walkDirectory(root, { root, pool }, context)
  return context.result
}

async function loadAmbientPool(root: string, logger: Logger): Promise<DefinitionPool | undefined> {
  try {
    const pool = await loadDefinitionPool(root)
    logger.debug(`loaded ${pool.size} definitions from ${pool.source}`)
    return pool
  } catch (error) {
    if (error instanceof DefinitionsNotFoundError) {
      logger.warn(`${error.message}; schemas using $ref will fail`)
      return undefined
    }
    throw error
  }
}

async function walkDirectory(dir: string, scope: Scope, context: WalkContext): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true })
  entries.sort((a, b) => compareNames(a.name, b.name))

  for (const entry of entries) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      if (await ownsDefinitions(path)) {
        context.logger.debug(`skipping ${path}: its own ${DEFINITIONS_FILE} shadows ${scope.root}`)
        context.result.shadowed.push(path)
        continue
      }
      await walkDirectory(path, scope, context)
    } else if (entry.isFile() && isSchemaFile(entry.name)) {
      const bytes = await resolveSchemaDocument(path, scope.pool)
      await context.sink.route(path, bytes)
      context.result.schemas.push(path)
    }
  }
}

/** Anything at `<dir>/definitions.json` other than "does not exist" counts. */
async function ownsDefinitions(dir: string): Promise<boolean> {
  try {
    await stat(join(dir, DEFINITIONS_FILE))
    return true
  } catch (error) {
    return !isNotFound(error)
  }
}

export function isSchemaFile(name: string): boolean {
  return name !== DEFINITIONS_FILE && extname(name) === '.json'
}

/**
 * Read one schema file, inject the definitions it needs and serialize it.
 */
export async function resolveSchemaDocument(path: string, pool: DefinitionPool | undefined): Promise<Uint8Array> {
  const raw = await readFile(path, 'utf8')

  let document: unknown
  try {
    document = JSON.parse(raw)
  } catch (error) {
    throw new SchemaParseError(path, errorMessage(error))
  }
  if (!isJsonObject(document)) {
    throw new SchemaParseError(path, 'top-level value is not an object')
  }
  if (hasOwn(document, DEFINITIONS_KEY)) {
    throw new SchemaHasDefinitionsError(path)
  }

  document[DEFINITIONS_KEY] = resolveDocumentDefinitions(pool, document)
  return encoder.encode(JSON.stringify(document))
}
