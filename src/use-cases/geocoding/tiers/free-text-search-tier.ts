import { ProviderId } from '@constants/resolution-policy'
import { AddressQuery } from '@lib/address/address-query'
import { logger } from '@lib/logger'
import { GeocodingProvider } from '@providers/geo-provider/geo-provider.interface'
import { Assessment, CandidateJudge } from '../candidate-judge'
import { ResolutionStatus } from '../resolution-result'
import { freeTextVariants } from './query-variants'
import { ResolutionTier, TierAcceptance, isExactHouseNumber, summarizeRejections } from './resolution-tier'

/**
 * Free-text variants of the full address, tried in order.
 * An accepted candidate carrying the exact house number ends the tier at once;
 * otherwise the best accepted candidate across the variants is kept.
 */
export class FreeTextSearchTier implements ResolutionTier {
  readonly id = ProviderId.NOMINATIM_FREE

  constructor(
    private readonly provider: GeocodingProvider,
    readonly minScore: number,
    private readonly limit: number,
  ) {}

  appliesTo(query: AddressQuery): boolean {
    return query.street.length > 0
  }

  async attempt(query: AddressQuery, judge: CandidateJudge): Promise<TierAcceptance | null> {
    const houseNumber = query.houseNumber
    let fallback: Assessment | null = null

    for (const variant of freeTextVariants(query)) {
      const ranked = judge.rank(await this.provider.search(variant, this.limit), query, this.minScore)
      const accepted = ranked.filter((assessment) => assessment.accepted)

      const exact = accepted.find((assessment) => isExactHouseNumber(assessment.candidate, houseNumber))
      if (exact) return this.accept(exact)

      const [best] = accepted
      if (best && (!fallback || best.candidate.score > fallback.candidate.score)) {
        fallback = best
      }

      logger.debug({ tier: this.id, variant, rejected: summarizeRejections(ranked) }, 'Free-text variant tried')

      // Without a house number there is nothing better to look for
      if (fallback && !houseNumber) break
    }

    return fallback ? this.accept(fallback) : null
  }

  private accept(assessment: Assessment): TierAcceptance {
    return { candidate: assessment.candidate, providerId: this.id, status: ResolutionStatus.RESOLVED }
  }
}
