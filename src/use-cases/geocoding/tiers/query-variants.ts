import { env } from '@env/index'
import { AddressQuery } from '@lib/address/address-query'

const join = (...parts: Array<string | null | undefined>): string =>
  parts
    .map((part) => part?.trim())
    .filter(Boolean)
    .join(', ')

const unique = (values: string[]): string[] => [...new Set(values.filter(Boolean))]

/**
 * Free-text forms of a full address, most specific first.
 */
export function freeTextVariants(query: AddressQuery, country = env.COUNTRY_NAME): string[] {
  if (!query.street) return []

  const { street, city, region, streetName, houseNumber } = query

  return unique([
    join(street, city, country),
    streetName && houseNumber ? join(`${streetName} ${houseNumber}`, city, country) : '',
    region && region !== city ? join(street, city, region, country) : '',
  ])
}

/**
 * Looser forms used once every precise tier has failed.
 */
export function looseVariants(query: AddressQuery, country = env.COUNTRY_NAME): string[] {
  const { street, city, region, streetName, nameHint } = query

  return unique([
    nameHint && city ? join(nameHint, city, country) : '',
    streetName && city ? join(streetName, city, country) : '',
    city ? join(city, country) : join(street, region, country),
  ])
}
