import {
  DEFAULT_RESOLUTION_POLICY,
  DEFAULT_SCORING_WEIGHTS,
  HIGH_PRECISION_DECIMALS,
  MEDIUM_PRECISION_DECIMALS,
  MIN_STREET_TOKEN_LENGTH,
  ScoringWeights,
} from '@constants/resolution-policy'
import { AddressQuery } from '@lib/address/address-query'
import { GeoCandidate } from '@providers/geo-provider/geo-provider.interface'
import { CityValidator } from './city-validator'

const MEDICAL_AMENITIES = new Set(['hospital', 'clinic', 'doctors'])

const MAX_SCORE = 100

const digitsOnly = (value: string): string => value.replace(/\D/g, '')

const decimalsOf = (raw: string): number => {
  const dot = raw.indexOf('.')
  return dot === -1 ? 0 : raw.length - dot - 1
}

/**
 * Additive 0-100 confidence rubric for one raw candidate.
 */
export class CandidateScorer {
  private readonly weights: ScoringWeights

  constructor(
    weights: Partial<ScoringWeights> = {},
    private readonly cityValidator: CityValidator = new CityValidator(DEFAULT_RESOLUTION_POLICY.minCityNameLength),
  ) {
    this.weights = { ...DEFAULT_SCORING_WEIGHTS, ...weights }
  }

  score(candidate: GeoCandidate, query: AddressQuery, houseNumber: string | null): number {
    const display = candidate.displayText.toLowerCase()

    const total =
      this.scoreCity(candidate, query.city, display) +
      this.scoreHouseNumber(candidate, houseNumber, display) +
      this.scoreStreet(candidate, query.streetName, display) +
      this.scoreCompleteness(candidate) +
      this.scorePrecision(candidate) +
      this.scoreResultType(candidate)

    return Math.max(0, Math.min(MAX_SCORE, Math.round(total)))
  }

  private scoreCity(candidate: GeoCandidate, city: string, display: string): number {
    // Short names match too many unrelated places to count either way
    if (!this.cityValidator.isValidatable(city)) return 0

    if (this.cityValidator.isSameCity(city, candidate.metadata.city)) return this.weights.cityExact
    if (this.cityValidator.appearsIn(city, display)) return this.weights.cityInDisplay

    return this.weights.cityMismatch
  }

  private scoreHouseNumber(candidate: GeoCandidate, houseNumber: string | null, display: string): number {
    if (!houseNumber) return 0

    const wanted = houseNumber.toLowerCase()
    const found = candidate.metadata.houseNumber?.trim().toLowerCase()

    if (found) {
      if (found === wanted) return this.weights.houseNumberExact
      if (digitsOnly(found) === digitsOnly(wanted)) return this.weights.houseNumberDigits
      if (display.includes(wanted)) return this.weights.houseNumberInDisplay
      return 0
    }

    if (display.includes(wanted)) return this.weights.houseNumberOnlyInDisplay

    return this.weights.houseNumberMissing
  }

  private scoreStreet(candidate: GeoCandidate, streetName: string, display: string): number {
    const street = streetName.toLowerCase()
    if (street.length <= MIN_STREET_TOKEN_LENGTH) return 0

    const road = (candidate.metadata.road ?? '').toLowerCase()

    if (road && (road.includes(street) || street.includes(road))) return this.weights.streetInRoad
    if (display.includes(street)) return this.weights.streetInDisplay

    const tokens = street.split(/\s+/).filter((token) => token.length > MIN_STREET_TOKEN_LENGTH)
    if (tokens.length === 0) return 0

    const matched = tokens.filter((token) => display.includes(token) || road.includes(token)).length

    return Math.round((this.weights.streetTokens * matched) / tokens.length)
  }

  private scoreCompleteness(candidate: GeoCandidate): number {
    let score = 0
    if (candidate.metadata.houseNumber) score += this.weights.hasHouseNumberField
    if (candidate.metadata.road) score += this.weights.hasRoadField
    return score
  }

  private scorePrecision(candidate: GeoCandidate): number {
    const average = (decimalsOf(candidate.metadata.rawLat) + decimalsOf(candidate.metadata.rawLng)) / 2

    if (average >= HIGH_PRECISION_DECIMALS) return this.weights.highPrecision
    if (average >= MEDIUM_PRECISION_DECIMALS) return this.weights.mediumPrecision
    return 0
  }

  private scoreResultType(candidate: GeoCandidate): number {
    const { osmType, resultClass, resultType } = candidate.metadata

    let score = 0
    if (osmType === 'node') score += this.weights.pointResult
    else if (osmType === 'way') score += this.weights.wayResult

    if (resultClass === 'building' || resultType === 'house') {
      score += this.weights.buildingResult
    } else if (resultClass === 'amenity' && resultType && MEDICAL_AMENITIES.has(resultType)) {
      score += this.weights.medicalAmenity
    } else if (resultClass === 'place') {
      // Bare locality results are usually an over-eager city fallback
      score += this.weights.placeResult
    }

    return score
  }
}
