import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { compareNames } from '../core/order.js'

export type BlobEntry = readonly [key: string, bytes: Uint8Array]

/**
 * Transient per-service storage for resolved schema bytes, read back at emission.
 */
export interface BlobStore {
  readonly service: string
  /** Returns true when an earlier entry under the same key was replaced. */
  store(key: string, bytes: Uint8Array): Promise<boolean>
  /** All entries sorted by key. */
  entries(): Promise<BlobEntry[]>
  dispose(): Promise<void>
}

export type BlobStoreFactory = (service: string) => Promise<BlobStore>

const TEMP_PREFIX = 'schemabind-'

/**
 * One temporary directory per service, one file per key.
 */
export class TempDirBlobStore implements BlobStore {
  private readonly keys = new Set<string>()

  private constructor(readonly service: string, readonly dir: string) {}

  static async create(service: string): Promise<TempDirBlobStore> {
    const dir = await mkdtemp(join(tmpdir(), TEMP_PREFIX))
    return new TempDirBlobStore(service, dir)
  }

  async store(key: string, bytes: Uint8Array): Promise<boolean> {
    const replaced = this.keys.has(key)
    await writeFile(join(this.dir, key), bytes)
    this.keys.add(key)
    return replaced
  }

  async entries(): Promise<BlobEntry[]> {
    const names = (await readdir(this.dir)).sort(compareNames)
    const entries: BlobEntry[] = []
    for (const name of names) {
      const data = await readFile(join(this.dir, name))
      entries.push([name, new Uint8Array(data)])
    }
    return entries
  }

  async dispose(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true })
    this.keys.clear()
  }
}

export const createTempDirBlobStore: BlobStoreFactory = (service) => TempDirBlobStore.create(service)
