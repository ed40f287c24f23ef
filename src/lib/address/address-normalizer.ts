import { AddressQuery } from './address-query'

/**
 * Raw row of the input table, before any cleanup.
 */
export interface AddressRow {
  name?: string | null
  street_address?: string | null
  settlement?: string | null
  region?: string | null
}

type RewriteRule = {
  description: string
  pattern: RegExp
  replacement: string
}

const typo = (from: string, to: string): RewriteRule => ({
  description: `typo: ${from}`,
  pattern: new RegExp(from.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'g'),
  replacement: to,
})

/**
 * Street rewrite rules, applied in order.
 */
export const STREET_REWRITE_RULES: readonly RewriteRule[] = [
  { description: 'number sign', pattern: /№/g, replacement: '' },

  // Floor, entrance, apartment and office details
  { description: 'floor', pattern: /\s+ет\.\s*\d+/giu, replacement: '' },
  { description: 'floor (long form)', pattern: /\s+етаж\s+\d+/giu, replacement: '' },
  { description: 'entrance', pattern: /\s+вх\.\s*[А-Яа-я\d]+/giu, replacement: '' },
  { description: 'ground floor and rest', pattern: /\s+партер.*$/iu, replacement: '' },
  { description: 'office room', pattern: /\s+каб\.\s*\d+/giu, replacement: '' },
  { description: 'apartment (long form)', pattern: /\s+апартамент\s+\d+/giu, replacement: '' },
  { description: 'apartment', pattern: /\s+ап\.\s*\d+/giu, replacement: '' },
  { description: 'office', pattern: /\s+офис\s+\d+/giu, replacement: '' },

  typo('ул.ул.', 'ул.'),
  typo('Боо Божилов', 'Божко Божилов'),
  typo('Пков', 'Петков'),
  typo('Христо Смиpненски', 'Христо Смирненски'),
  typo('Цаp Симеон', 'Цар Симеон'),
  typo('Доц.д-р', 'Доц. д-р'),
  typo('Д-р', 'д-р'),

  { description: 'residential complex', pattern: /ж\.к\.\s*/gu, replacement: 'жк ' },
  { description: 'residential complex spacing', pattern: /жк\s+/gu, replacement: 'жк ' },
  { description: 'boulevard', pattern: /(?<!\p{L})бул\.\s*/gu, replacement: 'бул. ' },
  { description: 'street', pattern: /(?<!\p{L})ул\.\s*/gu, replacement: 'ул. ' },
  { description: 'block', pattern: /(?<!\p{L})бл\.\s*/gu, replacement: 'бл. ' },

  // "бул. Стефан Стамболов 73 приземен етаж ... сграда" -> "бул. Стефан Стамболов 73"
  {
    description: 'building description',
    pattern: /(бул\.|ул\.)\s*([А-Яа-я\s\-.]+?)\s+(\d+[А-Яа-я]?)\s+.*?(корпус|блок|сграда|част).*$/iu,
    replacement: '$1 $2 $3',
  },
  {
    description: 'landmark after number',
    pattern: /(\d+[А-Яа-я]?)\s+(?:до|срещу|зад|пред|над|при|около)\s.*$/iu,
    replacement: '$1',
  },
  // "жк Лазур бл. 158" -> "жк Лазур 158"
  { description: 'complex block', pattern: /(жк\s+[А-Яа-я\s]+?)\s+бл\.\s*(\d+)/gu, replacement: '$1 $2' },

  { description: 'whitespace', pattern: /\s+/g, replacement: ' ' },
  { description: 'comma spacing', pattern: /\s*,\s*/g, replacement: ', ' },
  // "ул. Витоша12" -> "ул. Витоша 12"
  { description: 'number glued to word', pattern: /([А-Яа-я])(\d)/gu, replacement: '$1 $2' },
]

const SETTLEMENT_PREFIX = /^(?:гр|с|к\.к)\.\s*/iu

const SETTLEMENT_ALIASES: ReadonlyArray<[string, string]> = [
  ['ОБРОЧИЩЕ К.К.АЛБЕНА', 'Албена'],
  ['ОБРОЧИЩЕ АЛБЕНА', 'Албена'],
  ['СОФИЯ-ГРАД', 'София'],
  ['ДОБРИЧ-ГРАД', 'Добрич'],
]

const CITY_DISTRICT_SUFFIX = /-ГРАД$/u

export function applyRewriteRules(value: string, rules: readonly RewriteRule[] = STREET_REWRITE_RULES): string {
  let result = value
  for (const rule of rules) {
    result = result.replace(rule.pattern, rule.replacement)
  }
  return result.trim().replace(/[,\s]+$/, '')
}

export function normalizeStreet(street: string | null | undefined): string {
  const value = (street ?? '').trim()
  if (!value) return ''

  return applyRewriteRules(value)
}

function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[\s-])(\p{L})/gu, (_match, separator: string, letter: string) => `${separator}${letter.toUpperCase()}`)
}

export function normalizeSettlement(settlement: string | null | undefined): string {
  let city = (settlement ?? '').replace(/\s+/g, ' ').trim()

  while (SETTLEMENT_PREFIX.test(city)) {
    city = city.replace(SETTLEMENT_PREFIX, '').trim()
  }

  const upper = city.toUpperCase()
  const alias = SETTLEMENT_ALIASES.find(([pattern]) => upper.includes(pattern))
  if (alias) return alias[1]

  if (CITY_DISTRICT_SUFFIX.test(upper)) {
    city = city.replace(/-град$/iu, '')
  }

  if (city.length > 3 && city === city.toUpperCase() && city !== city.toLowerCase()) {
    city = titleCase(city)
  }

  return city
}

/**
 * Builds the canonical query for one input row. A blank settlement falls back to the region.
 */
export function normalizeAddressRow(row: AddressRow): AddressQuery {
  const region = normalizeSettlement(row.region)
  const city = normalizeSettlement(row.settlement) || region

  return AddressQuery.create({
    street: normalizeStreet(row.street_address),
    city,
    region,
    nameHint: row.name,
  })
}
