import { AxiosInstance } from 'axios'
import { z } from 'zod'
import { env } from '@env/index'
import { logger } from '@lib/logger'
import { createHttpClient } from '@lib/http/axios'
import { RetryPolicy } from '@lib/retry/retry-policy'
import { GeoBackend, RequestGate } from '@lib/rate-limit/request-throttle'
import { ProviderId } from '@constants/resolution-policy'
import { PrecisionHelper } from '@providers/helpers/precision-helper'
import { MalformedProviderPayloadError } from './error/malformed-provider-payload-error'
import { ProviderRequestError } from './error/provider-request-error'
import { GeoCandidate, GeocodingProvider } from './geo-provider.interface'

const addressComponentSchema = z.object({
  long_name: z.string(),
  short_name: z.string(),
  types: z.array(z.string()),
})

const googleResultSchema = z.object({
  formatted_address: z.string(),
  geometry: z.object({
    location: z.object({ lat: z.number(), lng: z.number() }),
    location_type: z.string(),
  }),
  address_components: z.array(addressComponentSchema).default([]),
  types: z.array(z.string()).default([]),
})

const googleResponseSchema = z.object({
  status: z.string(),
  results: z.array(googleResultSchema).default([]),
  error_message: z.string().optional(),
})

type GoogleResult = z.infer<typeof googleResultSchema>

// Statuses worth another attempt
const RETRYABLE_STATUSES = new Set(['OVER_QUERY_LIMIT', 'UNKNOWN_ERROR'])

export class GoogleGeocodingProvider implements GeocodingProvider {
  private static api: AxiosInstance

  private readonly GOOGLE_TIMEOUT = 10000

  constructor(
    private readonly apiKey: string,
    private readonly gate: RequestGate,
    private readonly retryPolicy: RetryPolicy = new RetryPolicy(),
  ) {
    if (!GoogleGeocodingProvider.api) {
      GoogleGeocodingProvider.api = createHttpClient({
        baseURL: env.GOOGLE_GEOCODING_API_URL,
        timeout: this.GOOGLE_TIMEOUT,
      })
    }
  }

  async search(query: string, limit: number): Promise<GeoCandidate[]> {
    const results = await this.retryPolicy.execute(
      async () => {
        await this.gate.waitTurn(GeoBackend.GOOGLE)

        const response = await GoogleGeocodingProvider.api.get<unknown>('/geocode/json', {
          params: {
            address: query,
            key: this.apiKey,
            components: `country:${env.COUNTRY_CODE.toUpperCase()}`,
            language: env.COUNTRY_CODE,
          },
        })
        const parsed = googleResponseSchema.safeParse(response.data)

        if (!parsed.success) {
          throw new MalformedProviderPayloadError(
            'google',
            parsed.error.issues.map((issue) => issue.message),
          )
        }

        const { status, results, error_message: errorMessage } = parsed.data

        if (status === 'ZERO_RESULTS') return []
        if (status !== 'OK') {
          throw new ProviderRequestError('google', errorMessage ?? status, RETRYABLE_STATUSES.has(status))
        }

        logger.debug({ results: results.length }, 'Google geocoding request succeeded')
        return results
      },
      [],
      { provider: 'google', operation: 'search' },
    )

    return results.slice(0, limit).map((result) => this.toCandidate(result))
  }

  private toCandidate(result: GoogleResult): GeoCandidate {
    const component = (type: string) =>
      result.address_components.find((entry) => entry.types.includes(type))?.long_name

    const { lat, lng } = result.geometry.location

    return {
      lat,
      lng,
      displayText: result.formatted_address,
      providerId: ProviderId.GOOGLE,
      metadata: {
        houseNumber: component('street_number'),
        road: component('route'),
        city: component('locality') ?? component('postal_town'),
        resultClass: result.types.includes('premise') ? 'building' : undefined,
        resultType: result.types[0],
        rawLat: String(lat),
        rawLng: String(lng),
        precision: PrecisionHelper.fromGoogle(result.geometry.location_type),
      },
    }
  }
}
