import { DEGRADED_PROVIDER_SUFFIX, ProviderId } from '@constants/resolution-policy'
import { GeoCandidate } from '@providers/geo-provider/geo-provider.interface'
import { CacheEntry } from '@repositories/cache-entries-repository'
import { AmbiguityReason } from './ambiguity-detector'

export enum ResolutionStatus {
  RESOLVED = 'Resolved',
  CITY_LEVEL = 'CityLevel',
  FAILED = 'Failed',
}

export type RejectionReason = 'below_min_score' | AmbiguityReason

export interface ScoredCandidate extends GeoCandidate {
  score: number
  rejectionReason?: RejectionReason
}

export type ResolvedResult = {
  status: ResolutionStatus.RESOLVED | ResolutionStatus.CITY_LEVEL
  lat: number
  lng: number
  providerId: string
  displayText: string
  confidence: number
}

export type FailedResult = {
  status: ResolutionStatus.FAILED
  lat: null
  lng: null
  providerId: null
  displayText: null
  confidence: 0
}

export type ResolutionResult = ResolvedResult | FailedResult

export const FAILED_RESULT: FailedResult = Object.freeze({
  status: ResolutionStatus.FAILED,
  lat: null,
  lng: null,
  providerId: null,
  displayText: null,
  confidence: 0,
})

export function degradedProviderId(providerId: string): string {
  return providerId.endsWith(DEGRADED_PROVIDER_SUFFIX) ? providerId : `${providerId}${DEGRADED_PROVIDER_SUFFIX}`
}

/**
 * City-level identifiers: the loose fallback tier, any degraded identifier, and manual city pins.
 */
export function statusForProvider(providerId: string): ResolvedResult['status'] {
  if (
    providerId === ProviderId.NOMINATIM_CITY ||
    providerId === ProviderId.MANUAL_CITY ||
    providerId.endsWith(DEGRADED_PROVIDER_SUFFIX)
  ) {
    return ResolutionStatus.CITY_LEVEL
  }

  return ResolutionStatus.RESOLVED
}

export function resultFromCacheEntry(entry: CacheEntry): ResolvedResult {
  return {
    status: statusForProvider(entry.providerId),
    lat: entry.lat,
    lng: entry.lng,
    providerId: entry.providerId,
    displayText: entry.displayText,
    confidence: entry.score,
  }
}
