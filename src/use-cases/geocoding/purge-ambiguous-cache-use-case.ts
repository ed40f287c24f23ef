import { ResolutionCache } from '@lib/cache/resolution-cache'
import { logger } from '@lib/logger'
import { AmbiguityDetector } from './ambiguity-detector'

interface PurgeAmbiguousCacheUseCaseRequest {
  threshold?: number
}

interface PurgeAmbiguousCacheUseCaseResponse {
  removedKeys: string[]
  backupLocation: string | null
}

/**
 * Deletes cached results that look like provider fallbacks so their rows get
 * resolved again: members of a coordinate cluster of at least `threshold`
 * entries, and entries with a generic display text. The store is backed up
 * before the first deletion.
 */
export class PurgeAmbiguousCacheUseCase {
  constructor(
    private readonly cache: ResolutionCache,
    private readonly detector: AmbiguityDetector,
  ) {}

  async execute({
    threshold = this.detector.clusterThreshold,
  }: PurgeAmbiguousCacheUseCaseRequest = {}): Promise<PurgeAmbiguousCacheUseCaseResponse> {
    // Decide everything first so deletions do not shrink the clusters being measured
    const removedKeys: string[] = []

    for (const [key, entry] of this.cache.entries()) {
      const clusterSize = this.detector.clusterSize(entry.lat, entry.lng, key) + 1
      const city = key.split('||')[1] ?? ''

      if (clusterSize >= threshold || this.detector.isGenericDisplay(entry.displayText, city)) {
        removedKeys.push(key)
      }
    }

    if (removedKeys.length === 0) {
      logger.info({ threshold }, 'No ambiguous cache entries to purge')
      return { removedKeys, backupLocation: null }
    }

    const backupLocation = await this.cache.backup()

    for (const key of removedKeys) {
      await this.cache.delete(key)
    }

    logger.info(
      { removed: removedKeys.length, remaining: this.cache.size, threshold, backupLocation },
      'Ambiguous cache entries purged',
    )

    return { removedKeys, backupLocation }
  }
}
