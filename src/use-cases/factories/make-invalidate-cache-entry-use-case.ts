import { InvalidateCacheEntryUseCase } from '@use-cases/geocoding/invalidate-cache-entry-use-case'
import { getGeocodingEngine } from './make-geocoding-engine'

export async function makeInvalidateCacheEntryUseCase(): Promise<InvalidateCacheEntryUseCase> {
  const { cache } = await getGeocodingEngine()

  return new InvalidateCacheEntryUseCase(cache)
}
