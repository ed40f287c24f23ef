import { AddressQuery } from '@lib/address/address-query'
import { ResolutionCache } from '@lib/cache/resolution-cache'
import { logger } from '@lib/logger'

interface InvalidateCacheEntryUseCaseResponse {
  key: string
  deleted: boolean
}

export class InvalidateCacheEntryUseCase {
  constructor(private readonly cache: ResolutionCache) {}

  async execute(query: AddressQuery): Promise<InvalidateCacheEntryUseCaseResponse> {
    const key = query.cacheKey
    const deleted = await this.cache.delete(key)

    logger.info({ key, deleted }, 'Cache invalidation requested')

    return { key, deleted }
  }
}
