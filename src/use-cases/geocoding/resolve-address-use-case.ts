import { AddressQuery } from '@lib/address/address-query'
import { ResolutionCache } from '@lib/cache/resolution-cache'
import { logger } from '@lib/logger'
import { logError } from '@lib/logger/helpers'
import { NoGeoProviderError } from '@providers/geo-provider/error/no-geo-provider-error'
import { CandidateJudge } from './candidate-judge'
import { FAILED_RESULT, ResolutionResult, resultFromCacheEntry } from './resolution-result'
import { ResolutionTier, TierAcceptance } from './tiers/resolution-tier'

/**
 * Drives one query through the cache and the tier cascade.
 *
 * Calls are serialised: a second `execute` waits for the first to finish, so
 * per-backend rate limits hold even when callers overlap.
 */
export class ResolveAddressUseCase {
  private queue: Promise<unknown> = Promise.resolve()

  constructor(
    private readonly tiers: ResolutionTier[],
    private readonly cache: ResolutionCache,
    private readonly judge: CandidateJudge,
  ) {
    if (this.tiers.length === 0) {
      throw new NoGeoProviderError()
    }
  }

  execute(query: AddressQuery): Promise<ResolutionResult> {
    const run = this.queue.then(() => this.resolve(query))
    this.queue = run.catch(() => undefined)
    return run
  }

  private async resolve(query: AddressQuery): Promise<ResolutionResult> {
    const key = query.cacheKey

    const cached = this.cache.get(key)
    if (cached) {
      logger.debug({ key, provider: cached.providerId }, 'Resolution cache hit')
      return resultFromCacheEntry(cached)
    }

    for (const tier of this.tiers) {
      if (!tier.appliesTo(query)) continue

      const acceptance = await this.attemptTier(tier, query)
      if (!acceptance) continue

      return this.accept(key, acceptance)
    }

    logger.info({ key }, 'Every resolution tier exhausted')
    return FAILED_RESULT
  }

  // A tier that blows up counts the same as a tier with no candidates
  private async attemptTier(tier: ResolutionTier, query: AddressQuery): Promise<TierAcceptance | null> {
    try {
      const acceptance = await tier.attempt(query, this.judge)
      logger.debug({ tier: tier.id, accepted: acceptance !== null }, 'Tier attempted')
      return acceptance
    } catch (error) {
      logError(error, { tier: tier.id, key: query.cacheKey }, 'Resolution tier failed unexpectedly')
      return null
    }
  }

  private async accept(key: string, { candidate, providerId, status }: TierAcceptance): Promise<ResolutionResult> {
    await this.cache.put({
      key,
      lat: candidate.lat,
      lng: candidate.lng,
      providerId,
      displayText: candidate.displayText,
      score: candidate.score,
      createdAt: new Date().toISOString(),
    })

    logger.info({ key, provider: providerId, score: candidate.score, status }, 'Address resolved')

    return {
      status,
      lat: candidate.lat,
      lng: candidate.lng,
      providerId,
      displayText: candidate.displayText,
      confidence: candidate.score,
    }
  }
}
