import { basename, dirname, join } from 'node:path'
import { NoOpLogger, type Logger } from '../core/logger.js'
import { errorMessage } from '../core/errors.js'
import { lastFailure, runPool } from '../core/pool.js'
import { createTempDirBlobStore, type BlobStore, type BlobStoreFactory } from '../codegen/blobStore.js'
import { BIND_FILE, generateBindTs } from '../codegen/generateBindFile.js'
import { SCHEMA_FILE, generateSchemaTs } from '../codegen/generateSchemaFile.js'
import { writeFileRecursive } from '../codegen/writeFile.js'
import { compareNames } from '../core/order.js'

/**
 * - 'separate': one service per schema directory, named after it.
 * - 'merge': a single service named after the output package.
 */
export type PartitionPolicy = 'merge' | 'separate'

export interface PartitionRouterOptions {
  policy: PartitionPolicy
  /** Service name under 'merge'. Conventionally the basename of the output directory. */
  packageName: string
  logger?: Logger
  createStore?: BlobStoreFactory
  /** Services emitted at the same time during flush. */
  concurrency?: number
}

export interface RoutedSchema {
  service: string
  key: string
}

const SCHEMA_EXT = '.json'

/**
 * Routing table for one generation run: service name -> blob store.
 */
export class PartitionRouter {
  private readonly stores = new Map<string, BlobStore>()
  private readonly logger: Logger
  private readonly createStore: BlobStoreFactory
  private readonly concurrency: number

  constructor(private readonly options: PartitionRouterOptions) {
    this.logger = options.logger ?? new NoOpLogger()
    this.createStore = options.createStore ?? createTempDirBlobStore
    this.concurrency = Math.max(1, options.concurrency ?? 1)
  }

  get policy(): PartitionPolicy {
    return this.options.policy
  }

  serviceFor(originPath: string): string {
    if (this.options.policy === 'merge') {
      return this.options.packageName
    }
    return basename(dirname(originPath))
  }

  keyFor(originPath: string): string {
    return basename(originPath, SCHEMA_EXT)
  }

  async route(originPath: string, bytes: Uint8Array): Promise<RoutedSchema> {
    const service = this.serviceFor(originPath)
    const key = this.keyFor(originPath)

    let store = this.stores.get(service)
    if (!store) {
      store = await this.createStore(service)
      this.stores.set(service, store)
    }

    if (await store.store(key, bytes)) {
      this.logger.warn(`${originPath} replaces an earlier "${key}" schema in service ${service}`)
    }
    this.logger.debug(`routed ${originPath} -> ${service}/${key}`)
    return { service, key }
  }

  /** Service names routed so far, sorted. */
  services(): string[] {
    return [...this.stores.keys()].sort(compareNames)
  }

  /**
   * Directory a service's files are written to. Merged output and a service named
   * like the output directory itself land directly in `outputDir`.
   */
  outputDirFor(service: string, outputDir: string): string {
    if (this.options.policy === 'merge' || service === basename(outputDir)) {
      return outputDir
    }
    return join(outputDir, service)
  }

  /**
   * Emit schema.ts and bind.ts for every service. Services run concurrently,
   * the two files of one service are written in order. Every service is attempted;
   * the last failure is rethrown.
   */
  async flush(outputDir: string): Promise<string[]> {
    const services = this.services()
    const results = await runPool(services, this.concurrency, (service) => this.emitService(service, outputDir))

    results.forEach((result, index) => {
      if (!result.ok) {
        this.logger.error(`service ${services[index]}: ${errorMessage(result.error)}`)
      }
    })
    const failure = lastFailure(results)
    if (failure) {
      throw failure.error
    }
    return results.flatMap((result) => (result.ok ? result.value : []))
  }

  /** Drop all transient storage. Failures are logged, never thrown. */
  async dispose(): Promise<void> {
    for (const [service, store] of this.stores) {
      try {
        await store.dispose()
      } catch (error) {
        this.logger.warn(`cannot remove temporary storage of service ${service}: ${errorMessage(error)}`)
      }
    }
    this.stores.clear()
  }

  private async emitService(service: string, outputDir: string): Promise<string[]> {
    const store = this.stores.get(service)
    if (!store) {
      return []
    }
    const dir = this.outputDirFor(service, outputDir)
    const schemaPath = join(dir, SCHEMA_FILE)
    const bindPath = join(dir, BIND_FILE)

    await writeFileRecursive(schemaPath, generateSchemaTs(service, await store.entries()))
    await writeFileRecursive(bindPath, generateBindTs(service))
    this.logger.info(`generated ${service} in ${dir}`)
    return [schemaPath, bindPath]
  }
}
