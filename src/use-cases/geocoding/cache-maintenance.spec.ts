import { describe, it, expect, beforeEach } from 'vitest'
import { AddressQuery } from '@lib/address/address-query'
import { ResolutionCache } from '@lib/cache/resolution-cache'
import { InMemoryCacheEntriesRepository } from '@repositories/in-memory/in-memory-cache-entries-repository'
import { makeCacheEntry } from '@tests/factories/make-cache-entry'
import { AmbiguityDetector } from './ambiguity-detector'
import { CityValidator } from './city-validator'
import { GetCacheStatsUseCase } from './get-cache-stats-use-case'
import { InvalidateCacheEntryUseCase } from './invalidate-cache-entry-use-case'
import { PurgeAmbiguousCacheUseCase } from './purge-ambiguous-cache-use-case'

describe('cache maintenance', () => {
  let repository: InMemoryCacheEntriesRepository
  let cache: ResolutionCache
  let detector: AmbiguityDetector

  beforeEach(async () => {
    repository = new InMemoryCacheEntriesRepository()
    repository.items = [
      makeCacheEntry({ key: 'ул. Цар Борис 1||Варна||', lat: 43.2, lng: 27.9 }),
      makeCacheEntry({ key: 'ул. Драва 2||Варна||', lat: 43.2, lng: 27.9 }),
      makeCacheEntry({ key: 'ул. Охрид 3||Варна||', lat: 43.2, lng: 27.9 }),
      makeCacheEntry({
        key: 'ул. Шипка 4||Варна||',
        lat: 43.21,
        lng: 27.91,
        providerId: 'nominatim_free',
        displayText: 'ул. Шипка 4, Варна',
      }),
      makeCacheEntry({
        key: '||Русе||',
        lat: 43.8487,
        lng: 25.9534,
        providerId: 'nominatim_city_lowconf',
        displayText: 'МБАЛ, Русе, България',
      }),
    ]
    cache = new ResolutionCache(repository)
    await cache.load()
    detector = new AmbiguityDetector(cache, new CityValidator(4))
  })

  describe('GetCacheStatsUseCase', () => {
    it('should count entries by provider, status and shared coordinates', () => {
      const stats = new GetCacheStatsUseCase(cache, detector).execute()

      expect(stats).toEqual({
        size: 5,
        degraded: false,
        byProvider: { nominatim_structured: 3, nominatim_free: 1, nominatim_city_lowconf: 1 },
        byStatus: { Resolved: 4, CityLevel: 1 },
        clustered: 3,
      })
    })
  })

  describe('PurgeAmbiguousCacheUseCase', () => {
    it('should remove every member of a cluster and generic entries', async () => {
      const { removedKeys } = await new PurgeAmbiguousCacheUseCase(cache, detector).execute()

      expect(removedKeys).toEqual(['ул. Цар Борис 1||Варна||', 'ул. Драва 2||Варна||', 'ул. Охрид 3||Варна||', '||Русе||'])
      expect(repository.items.map((item) => item.key)).toEqual(['ул. Шипка 4||Варна||'])
    })

    it('should back up the store before the first deletion', async () => {
      const { backupLocation } = await new PurgeAmbiguousCacheUseCase(cache, detector).execute()

      expect(backupLocation).toBe('memory:1')
      expect(repository.backups).toHaveLength(1)
      expect(repository.backups[0]).toHaveLength(5)
    })

    it('should keep a city-level entry whose display text is a bare place name', async () => {
      await cache.put(
        makeCacheEntry({
          key: '||Габрово||',
          lat: 42.8742,
          lng: 25.3187,
          providerId: 'nominatim_city',
          displayText: 'Габрово, Габрово, България',
        }),
      )

      const { removedKeys } = await new PurgeAmbiguousCacheUseCase(cache, detector).execute({ threshold: 4 })

      expect(removedKeys).toEqual(['||Русе||'])
      expect(cache.has('||Габрово||')).toBe(true)
    })

    it('should neither back up nor delete when nothing is ambiguous', async () => {
      await cache.delete('||Русе||')

      const { removedKeys, backupLocation } = await new PurgeAmbiguousCacheUseCase(cache, detector).execute({
        threshold: 10,
      })

      expect(removedKeys).toEqual([])
      expect(backupLocation).toBeNull()
      expect(repository.backups).toEqual([])
      expect(cache.size).toBe(4)
    })

    it('should keep clusters smaller than the requested threshold', async () => {
      const { removedKeys } = await new PurgeAmbiguousCacheUseCase(cache, detector).execute({ threshold: 4 })

      expect(removedKeys).toEqual(['||Русе||'])
      expect(cache.size).toBe(4)
    })
  })

  describe('InvalidateCacheEntryUseCase', () => {
    it('should delete the entry of the query and report a second call as a miss', async () => {
      const sut = new InvalidateCacheEntryUseCase(cache)
      const query = AddressQuery.create({ street: 'ул. Шипка 4', city: 'Варна' })

      await expect(sut.execute(query)).resolves.toEqual({ key: 'ул. Шипка 4||Варна||', deleted: true })
      await expect(sut.execute(query)).resolves.toEqual({ key: 'ул. Шипка 4||Варна||', deleted: false })
      expect(cache.has('ул. Шипка 4||Варна||')).toBe(false)
    })
  })
})
