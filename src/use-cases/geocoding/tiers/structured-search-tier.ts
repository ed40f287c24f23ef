import { ProviderId } from '@constants/resolution-policy'
import { AddressQuery } from '@lib/address/address-query'
import { logger } from '@lib/logger'
import { StructuredGeocodingProvider } from '@providers/geo-provider/geo-provider.interface'
import { CandidateJudge } from '../candidate-judge'
import { ResolutionStatus } from '../resolution-result'
import { freeTextVariants } from './query-variants'
import { ResolutionTier, TierAcceptance, isExactHouseNumber, summarizeRejections } from './resolution-tier'

/**
 * Street + house number + city as discrete fields.
 *
 * When the accepted hit does not carry the queried house number itself, a free-text
 * search is run as a cross-check, and a free-text candidate with that exact number wins.
 */
export class StructuredSearchTier implements ResolutionTier {
  readonly id = ProviderId.NOMINATIM_STRUCTURED

  constructor(
    private readonly provider: StructuredGeocodingProvider,
    readonly minScore: number,
    private readonly crossCheckMinScore: number,
    private readonly limit: number,
  ) {}

  appliesTo(query: AddressQuery): boolean {
    return query.streetName.length > 0 && query.city.length > 0
  }

  async attempt(query: AddressQuery, judge: CandidateJudge): Promise<TierAcceptance | null> {
    const houseNumber = query.houseNumber

    const candidates = await this.provider.searchStructured(
      { street: query.streetName, city: query.city, houseNumber: houseNumber ?? undefined },
      this.limit,
    )
    const ranked = judge.rank(candidates, query, this.minScore)
    const best = ranked.find((assessment) => assessment.accepted)

    if (!best) {
      logger.debug({ tier: this.id, rejected: summarizeRejections(ranked) }, 'Tier found nothing acceptable')
      return null
    }

    if (houseNumber && !isExactHouseNumber(best.candidate, houseNumber)) {
      const superseding = await this.crossCheck(query, houseNumber, judge)

      if (superseding) {
        logger.debug(
          { tier: this.id, houseNumber, display: superseding.candidate.displayText },
          'Free-text candidate with the exact house number supersedes the structured hit',
        )
        return superseding
      }
    }

    return { candidate: best.candidate, providerId: this.id, status: ResolutionStatus.RESOLVED }
  }

  private async crossCheck(
    query: AddressQuery,
    houseNumber: string,
    judge: CandidateJudge,
  ): Promise<TierAcceptance | null> {
    const [fullAddress] = freeTextVariants(query)
    if (!fullAddress) return null

    const ranked = judge.rank(await this.provider.search(fullAddress, this.limit), query, this.crossCheckMinScore)
    const exact = ranked.find(
      (assessment) => assessment.accepted && isExactHouseNumber(assessment.candidate, houseNumber),
    )

    return exact
      ? { candidate: exact.candidate, providerId: ProviderId.NOMINATIM_FREE, status: ResolutionStatus.RESOLVED }
      : null
  }
}
