export interface CacheEntry {
  key: string
  lat: number
  lng: number
  providerId: string
  displayText: string
  score: number
  createdAt: string
}

/**
 * Durable store behind the resolution cache.
 *
 * `write` and `remove` receive the full in-memory snapshot after the change, so
 * stores that persist a whole document do not have to keep their own copy.
 */
export interface CacheEntriesRepository {
  readAll(): Promise<CacheEntry[]>
  write(entry: CacheEntry, snapshot: ReadonlyMap<string, CacheEntry>): Promise<void>
  remove(key: string, snapshot: ReadonlyMap<string, CacheEntry>): Promise<void>
  // Copies the stored entries aside; resolves to where the copy went, or null when there was nothing to copy
  backup?(): Promise<string | null>
  close?(): Promise<void>
}
