import { ProviderId } from '@constants/resolution-policy'
import { AddressQuery } from '@lib/address/address-query'
import { logger } from '@lib/logger'
import { GeocodingProvider } from '@providers/geo-provider/geo-provider.interface'
import { CandidateJudge } from '../candidate-judge'
import { ResolutionStatus, degradedProviderId } from '../resolution-result'
import { looseVariants } from './query-variants'
import { ResolutionTier, TierAcceptance } from './resolution-tier'

/**
 * Last resort: name + city, street without number, then the settlement alone.
 * Results are city-level. An ambiguous result is still kept, under the degraded
 * provider identifier; only a wrong settlement is rejected outright.
 */
export class LooseFallbackTier implements ResolutionTier {
  readonly id = ProviderId.NOMINATIM_CITY

  constructor(
    private readonly provider: GeocodingProvider,
    readonly minScore: number,
    private readonly limit: number,
  ) {}

  appliesTo(query: AddressQuery): boolean {
    return query.city.length > 0 || query.street.length > 0
  }

  async attempt(query: AddressQuery, judge: CandidateJudge): Promise<TierAcceptance | null> {
    for (const variant of looseVariants(query)) {
      const ranked = judge.rank(await this.provider.search(variant, this.limit), query, this.minScore)

      const usable = ranked.find(
        (assessment) => assessment.meetsMinScore && !assessment.verdict.reasons.includes('city_mismatch'),
      )

      if (!usable) {
        logger.debug({ tier: this.id, variant }, 'Loose variant found nothing usable')
        continue
      }

      const providerId = usable.verdict.ambiguous ? degradedProviderId(this.id) : this.id

      return { candidate: usable.candidate, providerId, status: ResolutionStatus.CITY_LEVEL }
    }

    return null
  }
}
