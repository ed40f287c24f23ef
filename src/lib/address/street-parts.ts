// Trailing "12", "12А", "12-14", "12/1" or "12А/3"
const HOUSE_NUMBER_PATTERN = /\b(\d+[А-Яа-яA-Za-z]?(?:[-/]\d+[А-Яа-яA-Za-z]?)?)\s*$/

const STREET_TYPE_PREFIX = /(?<!\p{L})(?:бул|ул|пл|кв)\.\s*/gu
const COMPLEX_PREFIX = /(?<!\p{L})жк\s*/gu
const TRAILING_NUMBER = /\s+\d+.*$/

export function extractHouseNumber(street: string): string | null {
  const match = HOUSE_NUMBER_PATTERN.exec(street.trim())
  return match ? match[1] : null
}

export function extractStreetName(street: string): string {
  return street
    .replace(STREET_TYPE_PREFIX, '')
    .replace(COMPLEX_PREFIX, '')
    .trim()
    .replace(TRAILING_NUMBER, '')
    .trim()
}
