import { ResolutionCache } from '@lib/cache/resolution-cache'
import { AmbiguityDetector } from './ambiguity-detector'
import { ResolutionStatus, statusForProvider } from './resolution-result'

export interface CacheStats {
  size: number
  degraded: boolean
  byProvider: Record<string, number>
  byStatus: Record<ResolutionStatus.RESOLVED | ResolutionStatus.CITY_LEVEL, number>
  // Entries sharing a coordinate with at least one other entry
  clustered: number
}

export class GetCacheStatsUseCase {
  constructor(
    private readonly cache: ResolutionCache,
    private readonly detector: AmbiguityDetector,
  ) {}

  execute(): CacheStats {
    const stats: CacheStats = {
      size: this.cache.size,
      degraded: this.cache.degraded,
      byProvider: {},
      byStatus: { [ResolutionStatus.RESOLVED]: 0, [ResolutionStatus.CITY_LEVEL]: 0 },
      clustered: 0,
    }

    for (const [key, entry] of this.cache.entries()) {
      stats.byProvider[entry.providerId] = (stats.byProvider[entry.providerId] ?? 0) + 1
      stats.byStatus[statusForProvider(entry.providerId)]++

      if (this.detector.clusterSize(entry.lat, entry.lng, key) > 0) stats.clustered++
    }

    return stats
  }
}
