import { ResolveBatchUseCase } from '@use-cases/geocoding/resolve-batch-use-case'
import { getGeocodingEngine } from './make-geocoding-engine'

export async function makeResolveBatchUseCase(): Promise<ResolveBatchUseCase> {
  const { resolveAddress } = await getGeocodingEngine()

  return new ResolveBatchUseCase(resolveAddress)
}
