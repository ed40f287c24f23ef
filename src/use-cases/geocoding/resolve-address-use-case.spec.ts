import { describe, it, expect, vi, beforeEach, afterEach, Mock } from 'vitest'
import { AddressQuery } from '@lib/address/address-query'
import { ResolutionCache } from '@lib/cache/resolution-cache'
import { NoGeoProviderError } from '@providers/geo-provider/error/no-geo-provider-error'
import { PoiGeocodingProvider, StructuredGeocodingProvider } from '@providers/geo-provider/geo-provider.interface'
import { InMemoryCacheEntriesRepository } from '@repositories/in-memory/in-memory-cache-entries-repository'
import { makeCacheEntry } from '@tests/factories/make-cache-entry'
import { makeCandidate } from '@tests/factories/make-candidate'
import { AmbiguityDetector } from './ambiguity-detector'
import { CandidateJudge } from './candidate-judge'
import { CandidateScorer } from './candidate-scorer'
import { CityValidator } from './city-validator'
import { ResolveAddressUseCase } from './resolve-address-use-case'
import { FAILED_RESULT, ResolutionStatus } from './resolution-result'
import { FreeTextSearchTier } from './tiers/free-text-search-tier'
import { LooseFallbackTier } from './tiers/loose-fallback-tier'
import { PoiSearchTier } from './tiers/poi-search-tier'
import { StructuredSearchTier } from './tiers/structured-search-tier'

describe('ResolveAddressUseCase', () => {
  let repository: InMemoryCacheEntriesRepository
  let cache: ResolutionCache
  let nominatim: {
    search: Mock<StructuredGeocodingProvider['search']>
    searchStructured: Mock<StructuredGeocodingProvider['searchStructured']>
  }
  let poi: { searchByName: Mock<PoiGeocodingProvider['searchByName']> }
  let sut: ResolveAddressUseCase

  const buildUseCase = (): ResolveAddressUseCase => {
    const validator = new CityValidator(4)
    const judge = new CandidateJudge(new CandidateScorer({}, validator), new AmbiguityDetector(cache, validator))

    return new ResolveAddressUseCase(
      [
        new StructuredSearchTier(nominatim, 60, 50, 10),
        new FreeTextSearchTier(nominatim, 50, 10),
        new PoiSearchTier(poi, 30, 5),
        new LooseFallbackTier(nominatim, 10, 5),
      ],
      cache,
      judge,
    )
  }

  beforeEach(async () => {
    repository = new InMemoryCacheEntriesRepository()
    cache = new ResolutionCache(repository)
    await cache.load()

    nominatim = {
      search: vi.fn<StructuredGeocodingProvider['search']>().mockResolvedValue([]),
      searchStructured: vi.fn<StructuredGeocodingProvider['searchStructured']>().mockResolvedValue([]),
    }
    poi = { searchByName: vi.fn<PoiGeocodingProvider['searchByName']>().mockResolvedValue([]) }

    sut = buildUseCase()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should require at least one tier', () => {
    const validator = new CityValidator(4)
    const judge = new CandidateJudge(new CandidateScorer({}, validator), new AmbiguityDetector(cache, validator))

    expect(() => new ResolveAddressUseCase([], cache, judge)).toThrow(NoGeoProviderError)
  })

  it('should resolve through the structured tier and serve the second call from the cache', async () => {
    const query = AddressQuery.create({ street: 'ул. Витоша 15', city: 'София' })
    nominatim.searchStructured.mockResolvedValueOnce([
      makeCandidate({
        lat: 42.6935219,
        lng: 23.3190385,
        displayText: '15, улица Витоша, Средец, София, България',
        providerId: 'nominatim_structured',
        metadata: {
          houseNumber: '15',
          road: 'улица Витоша',
          city: 'София',
          osmType: 'way',
          resultClass: 'building',
          rawLat: '42.6935219',
          rawLng: '23.3190385',
        },
      }),
    ])

    const first = await sut.execute(query)
    const second = await sut.execute(query)

    const expected = {
      status: ResolutionStatus.RESOLVED,
      lat: 42.6935219,
      lng: 23.3190385,
      providerId: 'nominatim_structured',
      displayText: '15, улица Витоша, Средец, София, България',
      confidence: 100,
    }
    expect(first).toEqual(expected)
    expect(second).toEqual(expected)
    expect(nominatim.searchStructured).toHaveBeenCalledTimes(1)
    expect(nominatim.searchStructured).toHaveBeenCalledWith({ street: 'Витоша', city: 'София', houseNumber: '15' }, 10)
    expect(nominatim.search).not.toHaveBeenCalled()
    expect(repository.items.map((item) => item.key)).toEqual(['ул. Витоша 15||София||'])
  })

  it('should prefer a free-text candidate with the exact house number over a structured hit without it', async () => {
    const query = AddressQuery.create({ street: 'бул. Христо Ботев 15', city: 'Пловдив' })
    nominatim.searchStructured.mockResolvedValueOnce([
      makeCandidate({
        lat: 42.1401,
        lng: 24.7389,
        displayText: '17, улица Христо Ботев, Пловдив, България',
        metadata: { houseNumber: '17', road: 'улица Христо Ботев', city: 'Пловдив', osmType: 'way' },
      }),
    ])
    nominatim.search.mockResolvedValueOnce([
      makeCandidate({
        lat: 42.1423,
        lng: 24.7412,
        displayText: '15, улица Христо Ботев, Пловдив, България',
        metadata: {
          houseNumber: '15',
          road: 'улица Христо Ботев',
          city: 'Пловдив',
          osmType: 'node',
          rawLat: '42.1423000',
          rawLng: '24.7412000',
        },
      }),
    ])

    const result = await sut.execute(query)

    expect(nominatim.search).toHaveBeenCalledWith('бул. Христо Ботев 15, Пловдив, България', 10)
    expect(result).toEqual({
      status: ResolutionStatus.RESOLVED,
      lat: 42.1423,
      lng: 24.7412,
      providerId: 'nominatim_free',
      displayText: '15, улица Христо Ботев, Пловдив, България',
      confidence: 100,
    })
  })

  it('should keep the structured hit when the cross-check finds no exact number', async () => {
    const query = AddressQuery.create({ street: 'бул. Христо Ботев 15', city: 'Пловдив' })
    nominatim.searchStructured.mockResolvedValueOnce([
      makeCandidate({
        lat: 42.1401,
        lng: 24.7389,
        displayText: '17, улица Христо Ботев, Пловдив, България',
        metadata: { houseNumber: '17', road: 'улица Христо Ботев', city: 'Пловдив', osmType: 'way' },
      }),
    ])

    const result = await sut.execute(query)

    // city 30 + street in road 25 + both address fields 15 + way 3
    expect(result).toMatchObject({ providerId: 'nominatim_structured', lat: 42.1401, confidence: 73 })
  })

  it('should fail and cache nothing when every tier comes back empty', async () => {
    const query = AddressQuery.create({ street: 'ул. Шипка 4', city: 'Казанлък', nameHint: 'МБАЛ Казанлък' })

    await expect(sut.execute(query)).resolves.toEqual(FAILED_RESULT)

    expect(poi.searchByName).toHaveBeenCalledWith('МБАЛ Казанлък', 'Казанлък', 5)
    expect(nominatim.search).toHaveBeenLastCalledWith('Казанлък, България', 5)
    expect(cache.size).toBe(0)
  })

  it('should move past a generic POI result to a city-level fallback', async () => {
    const query = AddressQuery.create({ city: 'Русе', nameHint: 'МБАЛ Русе' })
    poi.searchByName.mockResolvedValueOnce([
      makeCandidate({
        lat: 43.85,
        lng: 25.96,
        displayText: 'МБАЛ, Русе',
        providerId: 'overpass',
        metadata: { city: 'Русе', osmType: 'node', resultClass: 'amenity', resultType: 'hospital' },
      }),
    ])
    nominatim.search.mockResolvedValueOnce([
      makeCandidate({
        lat: 43.8487,
        lng: 25.9534,
        displayText: 'Русе, Русе, България',
        metadata: { city: 'Русе', osmType: 'relation', resultClass: 'place' },
      }),
    ])

    const result = await sut.execute(query)

    expect(nominatim.search).toHaveBeenCalledWith('МБАЛ Русе, Русе, България', 5)
    expect(result).toEqual({
      status: ResolutionStatus.CITY_LEVEL,
      lat: 43.8487,
      lng: 25.9534,
      providerId: 'nominatim_city',
      displayText: 'Русе, Русе, България',
      confidence: 10,
    })
    expect(cache.get(query.cacheKey)?.providerId).toBe('nominatim_city')
  })

  it('should keep a clustered city-level fallback under the degraded identifier', async () => {
    repository.items = [
      makeCacheEntry({ key: 'a||Габрово||', lat: 42.8742, lng: 25.3187 }),
      makeCacheEntry({ key: 'b||Габрово||', lat: 42.8742, lng: 25.3187 }),
      makeCacheEntry({ key: 'c||Габрово||', lat: 42.8742, lng: 25.3187 }),
    ]
    await cache.load()
    sut = buildUseCase()

    const query = AddressQuery.create({ city: 'Габрово' })
    nominatim.search.mockResolvedValueOnce([
      makeCandidate({
        lat: 42.8742,
        lng: 25.3187,
        displayText: 'Габрово, Габрово, България',
        metadata: { city: 'Габрово', osmType: 'relation', resultClass: 'place' },
      }),
    ])

    const result = await sut.execute(query)

    expect(result).toMatchObject({
      status: ResolutionStatus.CITY_LEVEL,
      lat: 42.8742,
      providerId: 'nominatim_city_lowconf',
    })
    expect(cache.get('||Габрово||')?.providerId).toBe('nominatim_city_lowconf')
  })

  it('should treat a tier that throws like a tier with no candidates', async () => {
    const query = AddressQuery.create({ street: 'ул. Витоша 15', city: 'София' })
    nominatim.searchStructured.mockRejectedValueOnce(new Error('unexpected'))
    nominatim.search.mockResolvedValueOnce([
      makeCandidate({
        displayText: '15, улица Витоша, София, България',
        metadata: { houseNumber: '15', road: 'улица Витоша', city: 'София' },
      }),
    ])

    const result = await sut.execute(query)

    expect(result).toMatchObject({ status: ResolutionStatus.RESOLVED, providerId: 'nominatim_free' })
  })

  it('should reject a candidate that lands on an existing coordinate cluster', async () => {
    repository.items = [
      makeCacheEntry({ key: 'a||Стара Загора||', lat: 42.4258, lng: 25.6345 }),
      makeCacheEntry({ key: 'b||Стара Загора||', lat: 42.4258, lng: 25.6345 }),
      makeCacheEntry({ key: 'c||Стара Загора||', lat: 42.4258, lng: 25.6345 }),
    ]
    await cache.load()
    sut = buildUseCase()

    const query = AddressQuery.create({ street: 'ул. Цар Симеон Велики 100', city: 'Стара Загора' })
    const clustered = makeCandidate({
      lat: 42.4258,
      lng: 25.6345,
      displayText: '100, улица Цар Симеон Велики, Стара Загора, България',
      metadata: { houseNumber: '100', road: 'улица Цар Симеон Велики', city: 'Стара Загора' },
    })
    nominatim.searchStructured.mockResolvedValue([clustered])
    nominatim.search.mockImplementation(async (variant) => (variant.includes('100') ? [clustered] : []))

    await expect(sut.execute(query)).resolves.toEqual(FAILED_RESULT)
    expect(cache.size).toBe(3)
  })

  it('should reject a loose result from another settlement', async () => {
    const query = AddressQuery.create({ city: 'Бургас' })
    nominatim.search.mockResolvedValueOnce([
      makeCandidate({ displayText: 'Варна, България', metadata: { city: 'Варна', resultClass: 'place' } }),
    ])

    await expect(sut.execute(query)).resolves.toEqual(FAILED_RESULT)
  })
})
