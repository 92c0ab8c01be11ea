import { access } from 'node:fs/promises'
import { describe, expect, it } from 'vitest'
import { TempDirBlobStore } from './blobStore.js'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

describe('TempDirBlobStore', () => {
  it('returns stored entries sorted by key', async () => {
    const store = await TempDirBlobStore.create('users')
    try {
      await store.store('update', encoder.encode('{"u":1}'))
      await store.store('create', encoder.encode('{"c":1}'))

      const entries = await store.entries()

      expect(entries.map(([key]) => key)).toEqual(['create', 'update'])
      expect(decoder.decode(entries[1][1])).toBe('{"u":1}')
    } finally {
      await store.dispose()
    }
  })

  it('reports when a key is overwritten', async () => {
    const store = await TempDirBlobStore.create('users')
    try {
      expect(await store.store('status', encoder.encode('1'))).toBe(false)
      expect(await store.store('status', encoder.encode('2'))).toBe(true)

      const entries = await store.entries()
      expect(entries).toHaveLength(1)
      expect(decoder.decode(entries[0][1])).toBe('2')
    } finally {
      await store.dispose()
    }
  })

  it('removes its directory on dispose', async () => {
    const store = await TempDirBlobStore.create('users')
    await store.store('create', encoder.encode('{}'))

    await store.dispose()

    await expect(access(store.dir)).rejects.toThrow()
  })
})
