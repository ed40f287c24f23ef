import { z } from 'zod'
import { CacheEntry } from './cache-entries-repository'

/**
 * Persisted form of one entry: `{ lat, lng, provider, display_name, score, created_at }`.
 * Older documents wrote `display` instead of `display_name` and carried no timestamp.
 */
export const storedCacheEntrySchema = z.object({
  lat: z.number(),
  lng: z.number(),
  provider: z.string(),
  display_name: z.string().nullish(),
  display: z.string().nullish(),
  score: z.number().default(0),
  created_at: z.string().optional(),
})

// Entries are validated one by one so a single bad row does not reject the document
export const cacheDocumentSchema = z.record(z.string(), z.unknown())

export type StoredCacheEntry = {
  lat: number
  lng: number
  provider: string
  display_name: string
  score: number
  created_at: string
}

const LEGACY_CREATED_AT = new Date(0).toISOString()

export function toStoredEntry(entry: CacheEntry): StoredCacheEntry {
  return {
    lat: entry.lat,
    lng: entry.lng,
    provider: entry.providerId,
    display_name: entry.displayText,
    score: entry.score,
    created_at: entry.createdAt,
  }
}

export function fromStoredEntry(key: string, stored: z.infer<typeof storedCacheEntrySchema>): CacheEntry {
  return {
    key,
    lat: stored.lat,
    lng: stored.lng,
    providerId: stored.provider,
    displayText: stored.display_name ?? stored.display ?? '',
    score: stored.score,
    createdAt: stored.created_at ?? LEGACY_CREATED_AT,
  }
}

export function toCacheDocument(entries: Iterable<CacheEntry>): Record<string, StoredCacheEntry> {
  const document: Record<string, StoredCacheEntry> = {}
  for (const entry of entries) {
    document[entry.key] = toStoredEntry(entry)
  }
  return document
}
