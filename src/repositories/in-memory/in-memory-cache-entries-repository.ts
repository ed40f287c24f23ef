import { CacheEntriesRepository, CacheEntry } from '../cache-entries-repository'

export class InMemoryCacheEntriesRepository implements CacheEntriesRepository {
  public items: CacheEntry[] = []
  public backups: CacheEntry[][] = []

  async readAll(): Promise<CacheEntry[]> {
    return [...this.items]
  }

  async write(entry: CacheEntry): Promise<void> {
    this.items = [...this.items.filter((item) => item.key !== entry.key), entry]
  }

  async remove(key: string): Promise<void> {
    this.items = this.items.filter((item) => item.key !== key)
  }

  async backup(): Promise<string | null> {
    this.backups.push([...this.items])
    return `memory:${this.backups.length}`
  }
}
