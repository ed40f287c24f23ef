import { GetCacheStatsUseCase } from '@use-cases/geocoding/get-cache-stats-use-case'
import { getGeocodingEngine } from './make-geocoding-engine'

export async function makeGetCacheStatsUseCase(): Promise<GetCacheStatsUseCase> {
  const { cache, detector } = await getGeocodingEngine()

  return new GetCacheStatsUseCase(cache, detector)
}
