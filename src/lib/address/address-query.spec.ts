import { describe, it, expect } from 'vitest'
import { InvalidAddressQueryError } from '@use-cases/errors/invalid-address-query-error'
import { AddressQuery } from './address-query'
import { extractHouseNumber, extractStreetName } from './street-parts'

describe('street parts', () => {
  it('should extract trailing house numbers', () => {
    expect(extractHouseNumber('ул. Витоша 12')).toBe('12')
    expect(extractHouseNumber('бул. България 12А')).toBe('12А')
    expect(extractHouseNumber('ул. Шипка 12-14')).toBe('12-14')
    expect(extractHouseNumber('ул. Витоша')).toBeNull()
  })

  it('should extract the street name without type prefix or number', () => {
    expect(extractStreetName('ул. Витоша 12')).toBe('Витоша')
    expect(extractStreetName('бул. Христо Ботев 15А')).toBe('Христо Ботев')
    expect(extractStreetName('жк Лазур 158')).toBe('Лазур')
  })
})

describe('AddressQuery', () => {
  it('should reject a query without street and city', () => {
    expect(() => AddressQuery.create({ street: '  ', city: '', region: 'Варна' })).toThrow(InvalidAddressQueryError)
  })

  it('should build the cache key from the cleaned triple', () => {
    const query = AddressQuery.create({ street: 'ул.  Витоша   12', city: ' София ' })

    expect(query.cacheKey).toBe('ул. Витоша 12||София||')
    expect(query.houseNumber).toBe('12')
    expect(query.streetName).toBe('Витоша')
    expect(query.nameHint).toBeUndefined()
  })

  it('should be immutable', () => {
    const query = AddressQuery.create({ city: 'Варна' })

    expect(Object.isFrozen(query)).toBe(true)
    expect(query.cacheKey).toBe('||Варна||')
  })
})
