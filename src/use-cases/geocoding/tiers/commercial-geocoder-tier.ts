import { ProviderId } from '@constants/resolution-policy'
import { AddressQuery } from '@lib/address/address-query'
import { logger } from '@lib/logger'
import { GeocodingProvider } from '@providers/geo-provider/geo-provider.interface'
import { CandidateJudge } from '../candidate-judge'
import { ResolutionStatus } from '../resolution-result'
import { freeTextVariants } from './query-variants'
import { ResolutionTier, TierAcceptance, summarizeRejections } from './resolution-tier'

export class CommercialGeocoderTier implements ResolutionTier {
  readonly id = ProviderId.GOOGLE

  constructor(
    private readonly provider: GeocodingProvider,
    readonly minScore: number,
    private readonly limit: number,
  ) {}

  appliesTo(query: AddressQuery): boolean {
    return query.street.length > 0
  }

  async attempt(query: AddressQuery, judge: CandidateJudge): Promise<TierAcceptance | null> {
    const [fullAddress] = freeTextVariants(query)
    if (!fullAddress) return null

    const ranked = judge.rank(await this.provider.search(fullAddress, this.limit), query, this.minScore)
    const best = ranked.find((assessment) => assessment.accepted)

    if (!best) {
      logger.debug({ tier: this.id, rejected: summarizeRejections(ranked) }, 'Tier found nothing acceptable')
      return null
    }

    return { candidate: best.candidate, providerId: this.id, status: ResolutionStatus.RESOLVED }
  }
}
