import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { CacheEntriesRepository } from '@repositories/cache-entries-repository'
import { InMemoryCacheEntriesRepository } from '@repositories/in-memory/in-memory-cache-entries-repository'
import { JsonFileCacheEntriesRepository } from '@repositories/json-file/json-file-cache-entries-repository'
import { makeCacheEntry } from '@tests/factories/make-cache-entry'
import { CacheStoreError } from './errors/cache-store-error'
import { ResolutionCache } from './resolution-cache'

const failingRepository = (): CacheEntriesRepository => ({
  readAll: vi.fn().mockRejectedValue(new CacheStoreError('read')),
  write: vi.fn().mockRejectedValue(new CacheStoreError('write')),
  remove: vi.fn().mockRejectedValue(new CacheStoreError('remove')),
})

describe('ResolutionCache', () => {
  let repository: InMemoryCacheEntriesRepository
  let cache: ResolutionCache

  beforeEach(async () => {
    repository = new InMemoryCacheEntriesRepository()
    repository.items = [makeCacheEntry()]
    cache = new ResolutionCache(repository)
    await cache.load()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should load every stored entry', () => {
    expect(cache.size).toBe(1)
    expect(cache.get('ул. Витоша 15||София||')?.score).toBe(82)
    expect(cache.degraded).toBe(false)
  })

  it('should persist a new entry', async () => {
    const entry = makeCacheEntry({ key: 'ул. Шипка 4||Казанлък||' })

    await expect(cache.put(entry)).resolves.toBe(true)

    expect(cache.has(entry.key)).toBe(true)
    expect(repository.items.map((item) => item.key)).toEqual(['ул. Витоша 15||София||', 'ул. Шипка 4||Казанлък||'])
  })

  it('should keep the original entry when the key already exists', async () => {
    const writeSpy = vi.spyOn(repository, 'write')

    await expect(cache.put(makeCacheEntry({ score: 10 }))).resolves.toBe(false)

    expect(cache.get('ул. Витоша 15||София||')?.score).toBe(82)
    expect(writeSpy).not.toHaveBeenCalled()
  })

  it('should delete an entry from memory and the store', async () => {
    await expect(cache.delete('ул. Витоша 15||София||')).resolves.toBe(true)
    await expect(cache.delete('ул. Витоша 15||София||')).resolves.toBe(false)

    expect(cache.size).toBe(0)
    expect(repository.items).toEqual([])
  })

  it('should start empty and degraded when the store cannot be read', async () => {
    const degraded = new ResolutionCache(failingRepository())

    await degraded.load()

    expect(degraded.size).toBe(0)
    expect(degraded.degraded).toBe(true)
  })

  it('should never write to a store it could not read', async () => {
    const store = failingRepository()
    const degraded = new ResolutionCache(store)
    await degraded.load()

    await expect(degraded.put(makeCacheEntry())).resolves.toBe(true)
    await expect(degraded.delete('ул. Витоша 15||София||')).resolves.toBe(true)

    expect(store.write).not.toHaveBeenCalled()
    expect(store.remove).not.toHaveBeenCalled()
    await expect(degraded.backup()).resolves.toBeNull()
  })

  it('should keep serving from memory when a write fails', async () => {
    const store = failingRepository()
    store.readAll = vi.fn().mockResolvedValue([])
    const degraded = new ResolutionCache(store)
    await degraded.load()
    expect(degraded.degraded).toBe(false)

    await expect(degraded.put(makeCacheEntry())).resolves.toBe(true)

    expect(store.write).toHaveBeenCalledTimes(1)
    expect(degraded.get('ул. Витоша 15||София||')?.providerId).toBe('nominatim_structured')
    expect(degraded.degraded).toBe(true)
  })

  it('should back up through the store', async () => {
    await expect(cache.backup()).resolves.toBe('memory:1')

    expect(repository.backups).toEqual([[makeCacheEntry()]])
  })

  describe('over a JSON file', () => {
    let dir: string
    let filePath: string

    const storedEntry = (lat: number) => ({
      lat,
      lng: 23.32,
      provider: 'nominatim_free',
      display_name: 'улица Витоша, София',
      score: 70,
      created_at: '2026-01-01T00:00:00.000Z',
    })

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'resolution-cache-'))
      filePath = join(dir, 'cache.json')
    })

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    it('should keep valid and invalid stored entries when one entry fails validation', async () => {
      await writeFile(
        filePath,
        JSON.stringify({
          'a||София||': storedEntry(42.1),
          'b||София||': storedEntry(42.2),
          'c||София||': { ...storedEntry(42.3), score: '70' },
          'd||София||': { ...storedEntry(42.4), lat: null },
        }),
      )
      const fileCache = new ResolutionCache(new JsonFileCacheEntriesRepository(filePath))

      await fileCache.load()
      await fileCache.put(makeCacheEntry())

      expect(fileCache.size).toBe(3)
      expect(fileCache.degraded).toBe(false)

      const onDisk = JSON.parse(await readFile(filePath, 'utf-8'))
      expect(Object.keys(onDisk).sort()).toEqual(['a||София||', 'b||София||', 'c||София||', 'd||София||', 'ул. Витоша 15||София||'])
      expect(onDisk['c||София||'].score).toBe('70')
      expect(onDisk['d||София||'].lat).toBeNull()
    })

    it('should leave an unreadable document untouched after a put', async () => {
      await writeFile(filePath, '{"a||София||": {"lat": 42.1,')
      const fileCache = new ResolutionCache(new JsonFileCacheEntriesRepository(filePath))

      await fileCache.load()
      await fileCache.put(makeCacheEntry())

      expect(fileCache.degraded).toBe(true)
      expect(fileCache.has('ул. Витоша 15||София||')).toBe(true)
      expect(await readFile(filePath, 'utf-8')).toBe('{"a||София||": {"lat": 42.1,')
    })
  })
})
