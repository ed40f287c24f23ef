import transliteration from '@constants/data/transliteration.json'
import { DEFAULT_RESOLUTION_POLICY } from '@constants/resolution-policy'
import { GeoCandidate } from '@providers/geo-provider/geo-provider.interface'

type TransliterationTable = {
  alphabet: Record<string, string>
  cities: string[][]
}

/**
 * Checks that a candidate lies in the queried settlement, accepting the
 * Cyrillic and Latin spellings of the same name.
 */
export class CityValidator {
  private readonly alphabet: Map<string, string>
  private readonly counterparts = new Map<string, Set<string>>()

  constructor(
    private readonly minCityNameLength: number = DEFAULT_RESOLUTION_POLICY.minCityNameLength,
    table: TransliterationTable = transliteration,
  ) {
    this.alphabet = new Map(Object.entries(table.alphabet))

    for (const [cyrillic, latin] of table.cities) {
      if (!cyrillic || !latin) continue
      this.link(cyrillic.toLowerCase(), latin.toLowerCase())
      this.link(latin.toLowerCase(), cyrillic.toLowerCase())
    }
  }

  /**
   * Names shorter than the minimum are not validated at all.
   */
  isValidatable(city: string): boolean {
    return city.trim().length >= this.minCityNameLength
  }

  transliterate(value: string): string {
    let result = ''
    for (const char of value.toLowerCase()) {
      result += this.alphabet.get(char) ?? char
    }
    return result
  }

  /**
   * Lower-cased spellings of a city name: itself, known counterparts, and its transliteration.
   */
  formsOf(city: string): string[] {
    const normalized = city.trim().toLowerCase()
    const forms = new Set([normalized, this.transliterate(normalized)])

    for (const counterpart of this.counterparts.get(normalized) ?? []) {
      forms.add(counterpart)
    }

    return [...forms]
  }

  appearsIn(city: string, text: string): boolean {
    const haystack = text.toLowerCase()
    if (!haystack) return false

    const transliterated = this.transliterate(haystack)
    return this.formsOf(city).some((form) => haystack.includes(form) || transliterated.includes(form))
  }

  isSameCity(city: string, other: string | undefined): boolean {
    if (!other) return false
    const wanted = other.trim().toLowerCase()
    return this.formsOf(city).some((form) => form === wanted || form === this.transliterate(wanted))
  }

  isValid(city: string, candidate: Pick<GeoCandidate, 'displayText' | 'metadata'>): boolean {
    if (!this.isValidatable(city)) return true

    if (this.isSameCity(city, candidate.metadata.city)) return true

    return this.appearsIn(city, `${candidate.metadata.city ?? ''} ${candidate.displayText}`)
  }

  private link(from: string, to: string): void {
    const set = this.counterparts.get(from) ?? new Set<string>()
    set.add(to)
    this.counterparts.set(from, set)
  }
}
