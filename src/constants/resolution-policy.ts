/**
 * Tunable thresholds of the resolution engine.
 *
 * None of these numbers has a derivation beyond the address corpus they were
 * first tuned on. Every consumer takes a partial override merged over these defaults.
 */

export enum ProviderId {
  GOOGLE = 'google',
  NOMINATIM_STRUCTURED = 'nominatim_structured',
  NOMINATIM_FREE = 'nominatim_free',
  OVERPASS = 'overpass',
  NOMINATIM_CITY = 'nominatim_city',
  MANUAL = 'manual',
  MANUAL_CITY = 'manual_city',
}

export const DEGRADED_PROVIDER_SUFFIX = '_lowconf'

export type TierMinScores = Record<
  ProviderId.GOOGLE | ProviderId.NOMINATIM_STRUCTURED | ProviderId.NOMINATIM_FREE | ProviderId.OVERPASS | ProviderId.NOMINATIM_CITY,
  number
>

export interface ScoringWeights {
  cityExact: number
  cityInDisplay: number
  cityMismatch: number
  houseNumberExact: number
  houseNumberDigits: number
  houseNumberInDisplay: number
  houseNumberOnlyInDisplay: number
  houseNumberMissing: number
  streetInRoad: number
  streetInDisplay: number
  streetTokens: number
  hasHouseNumberField: number
  hasRoadField: number
  highPrecision: number
  mediumPrecision: number
  pointResult: number
  wayResult: number
  buildingResult: number
  medicalAmenity: number
  placeResult: number
}

export interface ResolutionPolicy {
  tierMinScores: TierMinScores
  clusterThreshold: number
  coordinateTolerance: number
  minCityNameLength: number
  genericDisplayMaxLength: number
  candidateLimit: number
  looseCandidateLimit: number
  poiCandidateLimit: number
}

export const DEFAULT_TIER_MIN_SCORES: TierMinScores = {
  [ProviderId.GOOGLE]: 60,
  [ProviderId.NOMINATIM_STRUCTURED]: 60,
  [ProviderId.NOMINATIM_FREE]: 50,
  [ProviderId.OVERPASS]: 30,
  [ProviderId.NOMINATIM_CITY]: 10,
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  cityExact: 30,
  cityInDisplay: 20,
  cityMismatch: -30,
  houseNumberExact: 40,
  houseNumberDigits: 35,
  houseNumberInDisplay: 25,
  houseNumberOnlyInDisplay: 20,
  houseNumberMissing: -10,
  streetInRoad: 25,
  streetInDisplay: 15,
  streetTokens: 15,
  hasHouseNumberField: 8,
  hasRoadField: 7,
  highPrecision: 10,
  mediumPrecision: 5,
  pointResult: 5,
  wayResult: 3,
  buildingResult: 5,
  medicalAmenity: 5,
  placeResult: -20,
}

export const DEFAULT_RESOLUTION_POLICY: ResolutionPolicy = {
  tierMinScores: DEFAULT_TIER_MIN_SCORES,
  clusterThreshold: 3,
  coordinateTolerance: 1e-6,
  minCityNameLength: 4,
  genericDisplayMaxLength: 60,
  candidateLimit: 10,
  looseCandidateLimit: 5,
  poiCandidateLimit: 5,
}

// Average decimal places of lat/lng that earn the precision bonuses
export const HIGH_PRECISION_DECIMALS = 7
export const MEDIUM_PRECISION_DECIMALS = 5

// Significant street tokens are longer than this
export const MIN_STREET_TOKEN_LENGTH = 3

export const RETRY_DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 1000,
}

export const THROTTLE_WINDOWS = {
  nominatim: { points: 1, windowSeconds: 1 },
  overpass: { points: 1, windowSeconds: 1 },
  google: { points: 10, windowSeconds: 1 },
}

export const QUALITY_BUCKETS = {
  excellent: 80,
  good: 60,
  fair: 40,
}

export const DEFAULT_CHECKPOINT_EVERY = 20

export function mergePolicy(overrides: Partial<ResolutionPolicy> = {}): ResolutionPolicy {
  return {
    ...DEFAULT_RESOLUTION_POLICY,
    ...overrides,
    tierMinScores: { ...DEFAULT_RESOLUTION_POLICY.tierMinScores, ...overrides.tierMinScores },
  }
}
