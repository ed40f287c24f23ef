import { Redis } from 'ioredis'
import { env } from '@env/index'
import { ProviderId, ResolutionPolicy, mergePolicy } from '@constants/resolution-policy'
import { ResolutionCache } from '@lib/cache/resolution-cache'
import { logError } from '@lib/logger/helpers'
import { RequestThrottle } from '@lib/rate-limit/request-throttle'
import { RetryPolicy } from '@lib/retry/retry-policy'
import { GoogleGeocodingProvider } from '@providers/geo-provider/google-geocoding-provider'
import { NominatimGeoProvider } from '@providers/geo-provider/nominatim-provider'
import { OverpassPoiProvider } from '@providers/geo-provider/overpass-poi-provider'
import { CacheEntriesRepository } from '@repositories/cache-entries-repository'
import { JsonFileCacheEntriesRepository } from '@repositories/json-file/json-file-cache-entries-repository'
import { RedisCacheEntriesRepository } from '@repositories/redis/redis-cache-entries-repository'
import { AmbiguityDetector } from '@use-cases/geocoding/ambiguity-detector'
import { CandidateJudge } from '@use-cases/geocoding/candidate-judge'
import { CandidateScorer } from '@use-cases/geocoding/candidate-scorer'
import { CityValidator } from '@use-cases/geocoding/city-validator'
import { ResolveAddressUseCase } from '@use-cases/geocoding/resolve-address-use-case'
import { CommercialGeocoderTier } from '@use-cases/geocoding/tiers/commercial-geocoder-tier'
import { FreeTextSearchTier } from '@use-cases/geocoding/tiers/free-text-search-tier'
import { LooseFallbackTier } from '@use-cases/geocoding/tiers/loose-fallback-tier'
import { PoiSearchTier } from '@use-cases/geocoding/tiers/poi-search-tier'
import { ResolutionTier } from '@use-cases/geocoding/tiers/resolution-tier'
import { StructuredSearchTier } from '@use-cases/geocoding/tiers/structured-search-tier'

export interface GeocodingEngine {
  cache: ResolutionCache
  detector: AmbiguityDetector
  resolveAddress: ResolveAddressUseCase
}

export interface GeocodingEngineOptions {
  policy?: Partial<ResolutionPolicy>
  repository?: CacheEntriesRepository
}

function makeRedisCacheRepository(): RedisCacheEntriesRepository {
  // Connects on the first command, which is the HGETALL of cache.load()
  const redis = new Redis({
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD || undefined,
    connectionName: 'address-geocoder-cache',
    lazyConnect: true,
    connectTimeout: 5000,
    // A large hash takes a while to stream back
    commandTimeout: 10000,
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => (times > 3 ? null : times * 200),
  })

  redis.on('error', (error) => {
    logError(error, { hash: env.REDIS_CACHE_HASH }, 'Redis cache connection error')
  })

  return new RedisCacheEntriesRepository(redis, env.REDIS_CACHE_HASH)
}

function makeCacheRepository(): CacheEntriesRepository {
  if (env.CACHE_DRIVER === 'redis') return makeRedisCacheRepository()

  return new JsonFileCacheEntriesRepository(env.CACHE_FILE_PATH)
}

/**
 * Tiers in priority order. The commercial tier exists only with an API key.
 */
function makeResolutionTiers(policy: ResolutionPolicy): ResolutionTier[] {
  const gate = new RequestThrottle()
  const retryPolicy = new RetryPolicy()
  const nominatim = new NominatimGeoProvider(gate, retryPolicy)
  const overpass = new OverpassPoiProvider(gate, nominatim, retryPolicy)
  const { tierMinScores, candidateLimit, looseCandidateLimit, poiCandidateLimit } = policy

  const tiers: ResolutionTier[] = []

  if (env.GOOGLE_GEOCODING_API_KEY) {
    const google = new GoogleGeocodingProvider(env.GOOGLE_GEOCODING_API_KEY, gate, retryPolicy)
    tiers.push(new CommercialGeocoderTier(google, tierMinScores[ProviderId.GOOGLE], candidateLimit))
  }

  tiers.push(
    new StructuredSearchTier(
      nominatim,
      tierMinScores[ProviderId.NOMINATIM_STRUCTURED],
      tierMinScores[ProviderId.NOMINATIM_FREE],
      candidateLimit,
    ),
    new FreeTextSearchTier(nominatim, tierMinScores[ProviderId.NOMINATIM_FREE], candidateLimit),
    new PoiSearchTier(overpass, tierMinScores[ProviderId.OVERPASS], poiCandidateLimit),
    new LooseFallbackTier(nominatim, tierMinScores[ProviderId.NOMINATIM_CITY], looseCandidateLimit),
  )

  return tiers
}

export async function makeGeocodingEngine(options: GeocodingEngineOptions = {}): Promise<GeocodingEngine> {
  const policy = mergePolicy(options.policy)

  const cache = new ResolutionCache(options.repository ?? makeCacheRepository())
  await cache.load()

  const cityValidator = new CityValidator(policy.minCityNameLength)
  const detector = new AmbiguityDetector(cache, cityValidator, policy)
  const judge = new CandidateJudge(new CandidateScorer({}, cityValidator), detector)

  const resolveAddress = new ResolveAddressUseCase(makeResolutionTiers(policy), cache, judge)

  return { cache, detector, resolveAddress }
}

let sharedEngine: Promise<GeocodingEngine> | null = null

/**
 * Process-wide engine, loaded once on first use.
 */
export function getGeocodingEngine(): Promise<GeocodingEngine> {
  sharedEngine ??= makeGeocodingEngine()
  return sharedEngine
}

/**
 * Releases the cache store of the process-wide engine. Does nothing when no engine was created.
 */
export async function closeGeocodingEngine(): Promise<void> {
  if (!sharedEngine) return

  const engine = sharedEngine
  sharedEngine = null

  const { cache } = await engine
  await cache.close()
}
