import { basename, resolve } from 'node:path'
import { NoOpLogger, type Logger } from '../core/logger.js'
import { PartitionRouter, type PartitionPolicy } from '../resolve/router.js'
import { walkSchemaTree } from '../resolve/walker.js'
import type { BlobStoreFactory } from './blobStore.js'

export interface CodegenOptions {
  /**
   * Root of the schema tree. Its definitions.json, if any, is the ambient pool.
   */
  input: string
  /**
   * Output directory where generated files will be written. Its basename names
   * the merged service.
   */
  outputDir: string
  /**
   * Defaults to 'merge'.
   */
  policy?: PartitionPolicy
  logger?: Logger
  /** Services emitted concurrently. Defaults to 1. */
  concurrency?: number
  createStore?: BlobStoreFactory
}

export interface CodegenResult {
  services: string[]
  /** Generated files, two per service. */
  files: string[]
  /** Schema files embedded. */
  schemas: string[]
  /** Subtrees left for their own run. */
  shadowed: string[]
}

/**
 * Resolve one schema tree and write schema.ts + bind.ts per service.
 * Transient storage is removed whether or not generation succeeded.
 */
export async function runCodegen(options: CodegenOptions): Promise<CodegenResult> {
  const input = resolve(options.input)
  const outputDir = resolve(options.outputDir)
  const logger = options.logger ?? new NoOpLogger()

  const router = new PartitionRouter({
    policy: options.policy ?? 'merge',
    packageName: basename(outputDir),
    logger,
    createStore: options.createStore,
    concurrency: options.concurrency,
  })

  try {
    const walk = await walkSchemaTree(input, { sink: router, logger })
    const files = await router.flush(outputDir)
    return {
      services: router.services(),
      files,
      schemas: walk.schemas,
      shadowed: walk.shadowed,
    }
  } finally {
    await router.dispose()
  }
}
