import { logger } from '@lib/logger'
import { logError } from '@lib/logger/helpers'
import { CacheEntriesRepository, CacheEntry } from '@repositories/cache-entries-repository'

export interface CacheEntriesView {
  entries(): Iterable<[string, CacheEntry]>
}

/**
 * In-memory key -> entry map over a durable store.
 *
 * Entries are write-once: invalidation deletes the key and the next resolution
 * creates a new entry. Each put/delete is flushed to the store before it returns.
 * A store failure never propagates; the cache is marked degraded and keeps serving from memory.
 * A store that could not be read is never written: its contents stay as they were.
 */
export class ResolutionCache implements CacheEntriesView {
  private readonly entriesByKey = new Map<string, CacheEntry>()
  private isDegraded = false
  private isDetached = false

  constructor(private readonly repository: CacheEntriesRepository) {}

  async load(): Promise<void> {
    try {
      const entries = await this.repository.readAll()

      this.entriesByKey.clear()
      for (const entry of entries) {
        this.entriesByKey.set(entry.key, entry)
      }

      this.isDetached = false
      logger.info({ entries: this.entriesByKey.size }, 'Resolution cache loaded')
    } catch (error) {
      this.isDegraded = true
      this.isDetached = true
      logError(error, {}, 'Failed to load resolution cache, continuing in memory only')
    }
  }

  get(key: string): CacheEntry | undefined {
    return this.entriesByKey.get(key)
  }

  has(key: string): boolean {
    return this.entriesByKey.has(key)
  }

  /**
   * Stores a new entry. Returns false when the key already has one.
   */
  async put(entry: CacheEntry): Promise<boolean> {
    if (this.entriesByKey.has(entry.key)) {
      logger.warn({ key: entry.key }, 'Cache entry already exists, keeping the original')
      return false
    }

    this.entriesByKey.set(entry.key, entry)
    if (this.isDetached) return true

    try {
      await this.repository.write(entry, this.entriesByKey)
    } catch (error) {
      this.isDegraded = true
      logError(error, { key: entry.key }, 'Failed to persist cache entry, kept in memory only')
    }

    return true
  }

  async delete(key: string): Promise<boolean> {
    if (!this.entriesByKey.delete(key)) return false
    if (this.isDetached) return true

    try {
      await this.repository.remove(key, this.entriesByKey)
    } catch (error) {
      this.isDegraded = true
      logError(error, { key }, 'Failed to remove cache entry from the store')
    }

    return true
  }

  /**
   * Copies the stored entries aside before a bulk change. Store errors propagate.
   */
  async backup(): Promise<string | null> {
    if (this.isDetached || !this.repository.backup) return null

    return this.repository.backup()
  }

  entries(): Iterable<[string, CacheEntry]> {
    return this.entriesByKey.entries()
  }

  async close(): Promise<void> {
    await this.repository.close?.()
  }

  get size(): number {
    return this.entriesByKey.size
  }

  get degraded(): boolean {
    return this.isDegraded
  }
}
