import { readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { errorMessage } from '../core/errors.js'
import { NoOpLogger, type Logger } from '../core/logger.js'
import { lastFailure, runPool } from '../core/pool.js'
import { compareNames } from '../core/order.js'
import { DEFINITIONS_FILE, isNotFound } from '../resolve/definitions.js'
import type { PartitionPolicy } from '../resolve/router.js'
import { runCodegen, type CodegenResult } from './index.js'

/** Schemas live under `<root>/schema`, generated code under `<root>/src`. */
const SCHEMA_DIR = 'schema'
const SOURCE_DIR = 'src'

export interface GlobTarget {
  input: string
  outputDir: string
}

export interface GlobCodegenOptions {
  searchRoots: readonly string[]
  policy?: PartitionPolicy
  /** Targets generated at the same time. */
  concurrency?: number
  logger?: Logger
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch (error) {
    if (isNotFound(error)) return false
    throw error
  }
}

async function hasDefinitionsFile(dir: string): Promise<boolean> {
  try {
    return (await stat(join(dir, DEFINITIONS_FILE))).isFile()
  } catch (error) {
    if (isNotFound(error)) return false
    throw error
  }
}

/**
 * Find the trees to generate under every search root.
 *
 * Only directories present under both `<root>/schema` and `<root>/src` are
 * considered. Each top-level one is a target, and so is every deeper one carrying
 * its own definitions.json, since the parent's run skips it.
 */
export async function discoverGlobTargets(searchRoots: readonly string[]): Promise<GlobTarget[]> {
  const targets: GlobTarget[] = []
  for (const root of searchRoots) {
    const schemaBase = join(root, SCHEMA_DIR)
    const sourceBase = join(root, SOURCE_DIR)
    if (!(await isDirectory(schemaBase)) || !(await isDirectory(sourceBase))) {
      continue
    }
    await collectTargets(schemaBase, sourceBase, '', targets)
  }
  return targets
}

async function collectTargets(schemaBase: string, sourceBase: string, relative: string, targets: GlobTarget[]): Promise<void> {
  const entries = await readdir(join(schemaBase, relative), { withFileTypes: true })
  const dirs = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort(compareNames)

  for (const name of dirs) {
    const path = join(relative, name)
    if (!(await isDirectory(join(sourceBase, path)))) {
      continue
    }
    if (relative === '' || (await hasDefinitionsFile(join(schemaBase, path)))) {
      targets.push({ input: join(schemaBase, path), outputDir: join(sourceBase, path) })
    }
    await collectTargets(schemaBase, sourceBase, path, targets)
  }
}

/**
 * Generate every discovered target. Targets are independent: one failing does not
 * stop the others, and the last failure is rethrown once all have settled.
 */
export async function runGlobCodegen(options: GlobCodegenOptions): Promise<CodegenResult[]> {
  const logger = options.logger ?? new NoOpLogger()
  const concurrency = Math.max(1, options.concurrency ?? 1)

  if (options.searchRoots.length === 0) {
    logger.warn('no search roots configured, nothing to generate')
    return []
  }

  const targets = await discoverGlobTargets(options.searchRoots)
  if (targets.length === 0) {
    logger.warn('no schema trees found under the search roots')
    return []
  }
  logger.debug(`found ${targets.length} schema tree(s)`)

  const results = await runPool(targets, concurrency, (target) =>
    runCodegen({
      input: target.input,
      outputDir: target.outputDir,
      policy: options.policy,
      logger,
    })
  )

  results.forEach((result, index) => {
    if (!result.ok) {
      logger.error(`${targets[index].input}: ${errorMessage(result.error)}`)
    }
  })
  const failure = lastFailure(results)
  if (failure) {
    throw failure.error
  }
  return results.flatMap((result) => (result.ok ? [result.value] : []))
}
