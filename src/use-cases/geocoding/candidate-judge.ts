import { AddressQuery } from '@lib/address/address-query'
import { GeoCandidate } from '@providers/geo-provider/geo-provider.interface'
import { AmbiguityDetector, AmbiguityVerdict } from './ambiguity-detector'
import { CandidateScorer } from './candidate-scorer'
import { ScoredCandidate } from './resolution-result'

export interface Assessment {
  candidate: ScoredCandidate
  verdict: AmbiguityVerdict
  // Score gate only; ambiguity is reported separately so tiers can decide
  meetsMinScore: boolean
  accepted: boolean
}

/**
 * Applies the acceptance gate shared by every tier: score >= tier minimum,
 * city validation passes, and the candidate is not ambiguous.
 */
export class CandidateJudge {
  constructor(
    private readonly scorer: CandidateScorer,
    private readonly detector: AmbiguityDetector,
  ) {}

  assess(candidate: GeoCandidate, query: AddressQuery, minScore: number): Assessment {
    const score = this.scorer.score(candidate, query, query.houseNumber)
    const verdict = this.detector.evaluate(candidate, query.city, query.cacheKey)
    const meetsMinScore = score >= minScore

    const rejectionReason = !meetsMinScore ? 'below_min_score' : verdict.reasons[0]

    return {
      candidate: { ...candidate, score, ...(rejectionReason ? { rejectionReason } : {}) },
      verdict,
      meetsMinScore,
      accepted: meetsMinScore && !verdict.ambiguous,
    }
  }

  /**
   * Assesses every candidate and returns them best first.
   */
  rank(candidates: GeoCandidate[], query: AddressQuery, minScore: number): Assessment[] {
    return candidates
      .map((candidate) => this.assess(candidate, query, minScore))
      .sort((a, b) => b.candidate.score - a.candidate.score)
  }
}
