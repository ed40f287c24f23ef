import { AddressQuery } from '@lib/address/address-query'
import { Assessment, CandidateJudge } from '../candidate-judge'
import { ResolvedResult, ScoredCandidate } from '../resolution-result'

export interface TierAcceptance {
  candidate: ScoredCandidate
  providerId: string
  status: ResolvedResult['status']
}

/**
 * One attempt in the resolution cascade. A tier returns null when it has nothing
 * acceptable, which moves the cascade on; it never throws for provider failures.
 */
export interface ResolutionTier {
  readonly id: string
  readonly minScore: number
  appliesTo(query: AddressQuery): boolean
  attempt(query: AddressQuery, judge: CandidateJudge): Promise<TierAcceptance | null>
}

export function isExactHouseNumber(candidate: ScoredCandidate, houseNumber: string | null): boolean {
  if (!houseNumber) return false
  return candidate.metadata.houseNumber?.trim().toLowerCase() === houseNumber.toLowerCase()
}

export function summarizeRejections(assessments: Assessment[]): Array<Record<string, unknown>> {
  return assessments
    .filter((assessment) => !assessment.accepted)
    .map(({ candidate }) => ({ display: candidate.displayText, score: candidate.score, reason: candidate.rejectionReason }))
}
