import { CacheEntry } from '@repositories/cache-entries-repository'

export function makeCacheEntry(overrides: Partial<CacheEntry> = {}): CacheEntry {
  return {
    key: 'ул. Витоша 15||София||',
    lat: 42.6977082,
    lng: 23.3218675,
    providerId: 'nominatim_structured',
    displayText: '15, улица Витоша, София, България',
    score: 82,
    createdAt: '2026-03-01T10:00:00.000Z',
    ...overrides,
  }
}
