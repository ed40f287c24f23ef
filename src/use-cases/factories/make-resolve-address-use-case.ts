import { ResolveAddressUseCase } from '@use-cases/geocoding/resolve-address-use-case'
import { getGeocodingEngine } from './make-geocoding-engine'

export async function makeResolveAddressUseCase(): Promise<ResolveAddressUseCase> {
  const { resolveAddress } = await getGeocodingEngine()

  return resolveAddress
}
