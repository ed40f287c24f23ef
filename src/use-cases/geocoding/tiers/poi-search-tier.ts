import { ProviderId } from '@constants/resolution-policy'
import { AddressQuery } from '@lib/address/address-query'
import { logger } from '@lib/logger'
import { PoiGeocodingProvider } from '@providers/geo-provider/geo-provider.interface'
import { CandidateJudge } from '../candidate-judge'
import { ResolutionStatus } from '../resolution-result'
import { ResolutionTier, TierAcceptance } from './resolution-tier'

/**
 * Entity name inside the settlement's bounding box. A low-trust tier: an
 * ambiguous result is dropped and the cascade goes on.
 */
export class PoiSearchTier implements ResolutionTier {
  readonly id = ProviderId.OVERPASS

  constructor(
    private readonly provider: PoiGeocodingProvider,
    readonly minScore: number,
    private readonly limit: number,
  ) {}

  appliesTo(query: AddressQuery): boolean {
    return Boolean(query.nameHint) && query.city.length > 0
  }

  async attempt(query: AddressQuery, judge: CandidateJudge): Promise<TierAcceptance | null> {
    if (!query.nameHint) return null

    const candidates = await this.provider.searchByName(query.nameHint, query.city, this.limit)

    for (const assessment of judge.rank(candidates, query, this.minScore)) {
      if (assessment.accepted) {
        return { candidate: assessment.candidate, providerId: this.id, status: ResolutionStatus.RESOLVED }
      }

      if (assessment.meetsMinScore) {
        logger.debug(
          { tier: this.id, display: assessment.candidate.displayText, reasons: assessment.verdict.reasons },
          'POI result is ambiguous, not caching it',
        )
      }
    }

    return null
  }
}
