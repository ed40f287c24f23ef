import { Redis } from 'ioredis'
import { logger } from '@lib/logger'
import { CacheStoreError } from '@lib/cache/errors/cache-store-error'
import { CacheEntriesRepository, CacheEntry } from '../cache-entries-repository'
import { fromStoredEntry, storedCacheEntrySchema, toStoredEntry } from '../cache-document'

/**
 * One Redis hash, field = cache key, value = the JSON-encoded stored entry.
 */
export class RedisCacheEntriesRepository implements CacheEntriesRepository {
  constructor(
    private readonly redis: Redis,
    private readonly hashKey: string,
  ) {}

  async readAll(): Promise<CacheEntry[]> {
    let fields: Record<string, string>
    try {
      fields = await this.redis.hgetall(this.hashKey)
    } catch (error) {
      throw new CacheStoreError('read', { cause: error })
    }

    const entries: CacheEntry[] = []
    for (const [key, value] of Object.entries(fields)) {
      const entry = this.parseField(key, value)
      if (entry) entries.push(entry)
    }

    return entries
  }

  async write(entry: CacheEntry): Promise<void> {
    try {
      await this.redis.hset(this.hashKey, entry.key, JSON.stringify(toStoredEntry(entry)))
    } catch (error) {
      throw new CacheStoreError('write', { cause: error })
    }
  }

  async remove(key: string): Promise<void> {
    try {
      await this.redis.hdel(this.hashKey, key)
    } catch (error) {
      throw new CacheStoreError('remove', { cause: error })
    }
  }

  /**
   * Copies the hash to `<hash>:bak`, replacing an older copy.
   */
  async backup(): Promise<string | null> {
    const backupKey = `${this.hashKey}:bak`

    try {
      const copied = await this.redis.copy(this.hashKey, backupKey, 'REPLACE')
      return copied === 1 ? backupKey : null
    } catch (error) {
      throw new CacheStoreError('backup', { cause: error })
    }
  }

  async close(): Promise<void> {
    await this.redis.quit()
  }

  private parseField(key: string, value: string): CacheEntry | null {
    try {
      const parsed = storedCacheEntrySchema.safeParse(JSON.parse(value))
      if (parsed.success) return fromStoredEntry(key, parsed.data)
    } catch (error) {
      logger.warn({ key, error }, 'Cache field is not valid JSON, skipping')
      return null
    }

    logger.warn({ key }, 'Cache field does not match the entry shape, skipping')
    return null
  }
}
