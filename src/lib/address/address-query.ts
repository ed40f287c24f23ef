import { InvalidAddressQueryError } from '@use-cases/errors/invalid-address-query-error'
import { extractHouseNumber, extractStreetName } from './street-parts'

export interface AddressQueryInput {
  street?: string | null
  city?: string | null
  region?: string | null
  nameHint?: string | null
}

const KEY_SEPARATOR = '||'

const clean = (value: string | null | undefined): string => (value ?? '').replace(/\s+/g, ' ').trim()

/**
 * Canonical (street, city, region) triple plus an optional entity name.
 * Instances are frozen; build them through `AddressQuery.create`.
 */
export class AddressQuery {
  private constructor(
    readonly street: string,
    readonly city: string,
    readonly region: string,
    readonly nameHint: string | undefined,
  ) {
    Object.freeze(this)
  }

  static create(input: AddressQueryInput): AddressQuery {
    const street = clean(input.street)
    const city = clean(input.city)

    if (!street && !city) {
      throw new InvalidAddressQueryError()
    }

    const nameHint = clean(input.nameHint)

    return new AddressQuery(street, city, clean(input.region), nameHint || undefined)
  }

  get cacheKey(): string {
    return [this.street, this.city, this.region].join(KEY_SEPARATOR)
  }

  get houseNumber(): string | null {
    return extractHouseNumber(this.street)
  }

  get streetName(): string {
    return extractStreetName(this.street)
  }
}
