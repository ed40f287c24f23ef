import { PurgeAmbiguousCacheUseCase } from '@use-cases/geocoding/purge-ambiguous-cache-use-case'
import { getGeocodingEngine } from './make-geocoding-engine'

export async function makePurgeAmbiguousCacheUseCase(): Promise<PurgeAmbiguousCacheUseCase> {
  const { cache, detector } = await getGeocodingEngine()

  return new PurgeAmbiguousCacheUseCase(cache, detector)
}
