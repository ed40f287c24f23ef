import { randomUUID } from 'node:crypto'
import { copyFile, readFile, rename, unlink, writeFile } from 'node:fs/promises'
import { logger } from '@lib/logger'
import { CacheStoreError } from '@lib/cache/errors/cache-store-error'
import { InvalidCacheDocumentError } from '@lib/cache/errors/invalid-cache-document-error'
import { CacheEntriesRepository, CacheEntry } from '../cache-entries-repository'
import { cacheDocumentSchema, fromStoredEntry, storedCacheEntrySchema, toCacheDocument } from '../cache-document'

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

/**
 * Whole cache as one pretty-printed JSON document.
 * Every write replaces the file through a temp file + rename.
 * Entries that fail validation are skipped on read and written back untouched.
 */
export class JsonFileCacheEntriesRepository implements CacheEntriesRepository {
  private queue: Promise<void> = Promise.resolve()
  private unreadable: Record<string, unknown> = {}

  constructor(private readonly filePath: string) {}

  async readAll(): Promise<CacheEntry[]> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info({ filePath: this.filePath }, 'Cache file not found, starting empty')
        return []
      }
      throw new CacheStoreError('read', { cause: error })
    }

    if (!raw.trim()) return []

    let document: unknown
    try {
      document = JSON.parse(raw)
    } catch {
      throw new InvalidCacheDocumentError(this.filePath)
    }

    const parsed = cacheDocumentSchema.safeParse(document)
    if (!parsed.success) {
      throw new InvalidCacheDocumentError(this.filePath)
    }

    const entries: CacheEntry[] = []
    this.unreadable = {}

    for (const [key, value] of Object.entries(parsed.data)) {
      const stored = storedCacheEntrySchema.safeParse(value)

      if (stored.success) {
        entries.push(fromStoredEntry(key, stored.data))
      } else {
        this.unreadable[key] = value
        logger.warn({ key, filePath: this.filePath }, 'Cache entry does not match the entry shape, skipping')
      }
    }

    return entries
  }

  async write(_entry: CacheEntry, snapshot: ReadonlyMap<string, CacheEntry>): Promise<void> {
    return this.enqueue(toCacheDocument(snapshot.values()), 'write')
  }

  async remove(_key: string, snapshot: ReadonlyMap<string, CacheEntry>): Promise<void> {
    return this.enqueue(toCacheDocument(snapshot.values()), 'remove')
  }

  /**
   * Copies the current file to `<file>.bak`. Resolves to null when no file exists yet.
   */
  async backup(): Promise<string | null> {
    const backupPath = `${this.filePath}.bak`

    await this.queue

    try {
      await copyFile(this.filePath, backupPath)
    } catch (error) {
      if (isMissingFile(error)) return null
      throw new CacheStoreError('backup', { cause: error })
    }

    return backupPath
  }

  // Writes run one after another so an older snapshot never lands last
  private enqueue(document: Record<string, unknown>, operation: 'write' | 'remove'): Promise<void> {
    const body = `${JSON.stringify({ ...this.unreadable, ...document }, null, 2)}\n`
    const next = this.queue.then(() => this.replaceFile(body, operation))

    this.queue = next.catch(() => undefined)

    return next
  }

  private async replaceFile(body: string, operation: 'write' | 'remove'): Promise<void> {
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`

    try {
      await writeFile(tempPath, body, 'utf-8')
      await rename(tempPath, this.filePath)
    } catch (error) {
      await unlink(tempPath).catch((unlinkError: unknown) => {
        logger.debug({ tempPath, unlinkError }, 'Temp cache file already gone')
      })
      throw new CacheStoreError(operation, { cause: error })
    }
  }
}
