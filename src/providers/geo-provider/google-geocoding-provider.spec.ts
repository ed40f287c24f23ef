import { describe, it, expect, vi, beforeEach } from 'vitest'

const { mockApi } = vi.hoisted(() => ({
  mockApi: { get: vi.fn(), post: vi.fn() },
}))

vi.mock('@lib/http/axios', () => ({
  createHttpClient: vi.fn(() => mockApi),
}))

import { RetryPolicy } from '@lib/retry/retry-policy'
import { GeoBackend } from '@lib/rate-limit/request-throttle'
import { makeStubGate } from '@tests/factories/make-stub-gate'
import { GeoPrecision } from './geo-provider.interface'
import { GoogleGeocodingProvider } from './google-geocoding-provider'

const okResponse = {
  status: 'OK',
  results: [
    {
      formatted_address: 'ul. "Vitosha" 15, 1000 Sofia Center, Sofia, Bulgaria',
      geometry: { location: { lat: 42.6935219, lng: 23.3190385 }, location_type: 'ROOFTOP' },
      address_components: [
        { long_name: '15', short_name: '15', types: ['street_number'] },
        { long_name: 'ulitsa "Vitosha"', short_name: 'ulitsa "Vitosha"', types: ['route'] },
        { long_name: 'Sofia', short_name: 'Sofia', types: ['locality', 'political'] },
      ],
      types: ['premise'],
    },
  ],
}

describe('GoogleGeocodingProvider', () => {
  const gate = makeStubGate()
  const sleep = vi.fn(async (_ms: number) => {})
  let provider: GoogleGeocodingProvider

  beforeEach(() => {
    vi.clearAllMocks()
    provider = new GoogleGeocodingProvider('test-secret', gate, new RetryPolicy({ maxAttempts: 2, baseDelayMs: 0, sleep }))
  })

  it('should map results restricted to the configured country', async () => {
    mockApi.get.mockResolvedValueOnce({ data: okResponse })

    const candidates = await provider.search('ул. Витоша 15, София, България', 5)

    expect(candidates).toEqual([
      {
        lat: 42.6935219,
        lng: 23.3190385,
        displayText: 'ul. "Vitosha" 15, 1000 Sofia Center, Sofia, Bulgaria',
        providerId: 'google',
        metadata: {
          houseNumber: '15',
          road: 'ulitsa "Vitosha"',
          city: 'Sofia',
          resultClass: 'building',
          resultType: 'premise',
          rawLat: '42.6935219',
          rawLng: '23.3190385',
          precision: GeoPrecision.ROOFTOP,
        },
      },
    ])
    expect(gate.waitTurn).toHaveBeenCalledWith(GeoBackend.GOOGLE)
    expect(mockApi.get).toHaveBeenCalledWith('/geocode/json', {
      params: {
        address: 'ул. Витоша 15, София, България',
        key: 'test-secret',
        components: 'country:BG',
        language: 'bg',
      },
    })
  })

  it('should treat ZERO_RESULTS as an empty answer', async () => {
    mockApi.get.mockResolvedValueOnce({ data: { status: 'ZERO_RESULTS', results: [] } })

    await expect(provider.search('nowhere', 5)).resolves.toEqual([])
    expect(mockApi.get).toHaveBeenCalledTimes(1)
  })

  it('should retry OVER_QUERY_LIMIT', async () => {
    mockApi.get
      .mockResolvedValueOnce({ data: { status: 'OVER_QUERY_LIMIT', results: [] } })
      .mockResolvedValueOnce({ data: okResponse })

    await expect(provider.search('x', 5)).resolves.toHaveLength(1)
    expect(mockApi.get).toHaveBeenCalledTimes(2)
  })

  it('should give up at once on REQUEST_DENIED', async () => {
    mockApi.get.mockResolvedValueOnce({
      data: { status: 'REQUEST_DENIED', results: [], error_message: 'The provided API key is invalid.' },
    })

    await expect(provider.search('x', 5)).resolves.toEqual([])
    expect(mockApi.get).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })
})
