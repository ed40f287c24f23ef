import { DEFAULT_RESOLUTION_POLICY, ResolutionPolicy } from '@constants/resolution-policy'
import { env } from '@env/index'
import { CacheEntriesView } from '@lib/cache/resolution-cache'
import { GeoCandidate } from '@providers/geo-provider/geo-provider.interface'
import { CityValidator } from './city-validator'

export type AmbiguityReason = 'coordinate_cluster' | 'generic_display' | 'city_mismatch'

export interface AmbiguityVerdict {
  ambiguous: boolean
  reasons: AmbiguityReason[]
  clusterSize: number
}

type DetectorOptions = Pick<ResolutionPolicy, 'clusterThreshold' | 'coordinateTolerance' | 'genericDisplayMaxLength'>

// Category words that name a kind of facility rather than a place
const GENERIC_WORDS = new Set([
  'болница',
  'болници',
  'мбал',
  'умбал',
  'сбал',
  'дкц',
  'мц',
  'мдц',
  'дпц',
  'кожно-венерологичен',
  'клиника',
  'поликлиника',
  'медицински',
  'медицинско',
  'диагностично-консултативен',
  'център',
  'центр',
  'hospital',
  'clinic',
  'medical',
  'center',
  'centre',
  'polyclinic',
])

const COUNTRY_WORDS = new Set(['българия', 'bulgaria', env.COUNTRY_NAME.toLowerCase()])

const TOKEN_SEPARATOR = /[\s,.;:"'„“()]+/u

/**
 * Flags results that look like a provider fallback rather than a specific match.
 */
export class AmbiguityDetector {
  private readonly options: DetectorOptions

  constructor(
    private readonly cache: CacheEntriesView,
    private readonly cityValidator: CityValidator = new CityValidator(),
    options: Partial<DetectorOptions> = {},
  ) {
    this.options = {
      clusterThreshold: options.clusterThreshold ?? DEFAULT_RESOLUTION_POLICY.clusterThreshold,
      coordinateTolerance: options.coordinateTolerance ?? DEFAULT_RESOLUTION_POLICY.coordinateTolerance,
      genericDisplayMaxLength: options.genericDisplayMaxLength ?? DEFAULT_RESOLUTION_POLICY.genericDisplayMaxLength,
    }
  }

  get clusterThreshold(): number {
    return this.options.clusterThreshold
  }

  /**
   * Cached entries, other than `excludeKey`, within the tolerance of the coordinate.
   */
  clusterSize(lat: number, lng: number, excludeKey?: string): number {
    const tolerance = this.options.coordinateTolerance
    let count = 0

    for (const [key, entry] of this.cache.entries()) {
      if (key === excludeKey) continue
      if (Math.abs(entry.lat - lat) <= tolerance && Math.abs(entry.lng - lng) <= tolerance) count++
    }

    return count
  }

  /**
   * Short text made up mostly of category words. Tokens naming the settlement or the country do not count,
   * so a bare place name is not generic.
   */
  isGenericDisplay(text: string, city = ''): boolean {
    const trimmed = text.trim()
    if (!trimmed || trimmed.toLowerCase() === 'unknown') return true
    if (trimmed.length > this.options.genericDisplayMaxLength) return false

    const cityForms = city ? new Set(this.cityValidator.formsOf(city)) : new Set<string>()
    const cityTokens = new Set([...cityForms].flatMap((form) => form.split(TOKEN_SEPARATOR)))

    const tokens = trimmed
      .toLowerCase()
      .split(TOKEN_SEPARATOR)
      .filter((token) => token && !/^\d+$/.test(token) && !COUNTRY_WORDS.has(token) && !cityTokens.has(token))

    if (tokens.length === 0) return false

    const generic = tokens.filter((token) => GENERIC_WORDS.has(token)).length

    return generic / tokens.length > 0.5
  }

  evaluate(candidate: GeoCandidate, city: string, ownKey?: string): AmbiguityVerdict {
    const reasons: AmbiguityReason[] = []
    const clusterSize = this.clusterSize(candidate.lat, candidate.lng, ownKey)

    if (clusterSize >= this.options.clusterThreshold) reasons.push('coordinate_cluster')
    if (this.isGenericDisplay(candidate.displayText, city)) reasons.push('generic_display')
    if (!this.cityValidator.isValid(city, candidate)) reasons.push('city_mismatch')

    return { ambiguous: reasons.length > 0, reasons, clusterSize }
  }
}
