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
import {
  BoundingBox,
  CityBoundsResolver,
  GeoCandidate,
  StructuredGeocodingProvider,
  StructuredSearchOptions,
} from './geo-provider.interface'

type NominatimSearchParams = Record<string, string | number | undefined>

const nominatimItemSchema = z.object({
  lat: z.string(),
  lon: z.string(),
  display_name: z.string(),
  name: z.string().optional(),
  class: z.string().optional(),
  type: z.string().optional(),
  osm_type: z.string().optional(),
  addresstype: z.string().optional(),
  place_rank: z.union([z.number(), z.string()]).optional(),
  boundingbox: z.array(z.string()).length(4).optional(),
  address: z.record(z.string(), z.string()).optional(),
})

const nominatimResponseSchema = z.array(nominatimItemSchema)

type NominatimSearchItem = z.infer<typeof nominatimItemSchema>

export class NominatimGeoProvider implements StructuredGeocodingProvider, CityBoundsResolver {
  private static api: AxiosInstance

  // HTTP Settings
  private readonly NOMINATIM_TIMEOUT = 15000

  // City bounds lookup
  private readonly CITY_BOUNDS_LIMIT = 5
  private readonly CITY_EXACT_NAME_SCORE = 50
  private readonly CITY_PARTIAL_NAME_SCORE = 30
  private readonly CITY_SETTLEMENT_CLASS_SCORE = 30
  private readonly CITY_MIN_SCORE = 50

  constructor(
    private readonly gate: RequestGate,
    private readonly retryPolicy: RetryPolicy = new RetryPolicy(),
  ) {
    if (!NominatimGeoProvider.api) {
      NominatimGeoProvider.api = createHttpClient({
        baseURL: env.NOMINATIM_API_URL,
        timeout: this.NOMINATIM_TIMEOUT,
      })
    }
  }

  async search(query: string, limit: number): Promise<GeoCandidate[]> {
    const items = await this.performRequest({ q: query, limit, dedupe: 0 }, 'search')
    return this.toCandidates(items, ProviderId.NOMINATIM_FREE)
  }

  async searchStructured(options: StructuredSearchOptions, limit: number): Promise<GeoCandidate[]> {
    const street = options.houseNumber ? `${options.street} ${options.houseNumber}` : options.street

    const items = await this.performRequest(
      { street, city: options.city, country: env.COUNTRY_NAME, limit },
      'searchStructured',
    )
    return this.toCandidates(items, ProviderId.NOMINATIM_STRUCTURED)
  }

  /**
   * Bounding box of a settlement, from the best scored settlement-like result.
   */
  async resolveCityBounds(city: string): Promise<BoundingBox | null> {
    const items = await this.performRequest(
      { q: `${city}, ${env.COUNTRY_NAME}`, limit: this.CITY_BOUNDS_LIMIT },
      'resolveCityBounds',
    )

    let best: { item: NominatimSearchItem; score: number } | null = null
    for (const item of items) {
      const score = this.scoreSettlement(item, city)
      if (score >= this.CITY_MIN_SCORE && (!best || score > best.score)) {
        best = { item, score }
      }
    }

    const bbox = best?.item.boundingbox?.map((value) => Number.parseFloat(value))
    if (!bbox || bbox.some((value) => Number.isNaN(value))) {
      logger.info({ city }, 'No settlement bounding box found')
      return null
    }

    // Nominatim orders the box as [south, north, west, east]
    const [south, north, west, east] = bbox
    return { south, west, north, east }
  }

  private scoreSettlement(item: NominatimSearchItem, city: string): number {
    const wanted = city.trim().toLowerCase()
    const name = (item.name ?? item.display_name.split(',')[0] ?? '').trim().toLowerCase()

    let score = 0
    if (name === wanted) {
      score += this.CITY_EXACT_NAME_SCORE
    } else if (name.includes(wanted) || wanted.includes(name)) {
      score += this.CITY_PARTIAL_NAME_SCORE
    }

    if (item.class === 'place' || item.class === 'boundary') {
      score += this.CITY_SETTLEMENT_CLASS_SCORE
    }

    return score
  }

  private async performRequest(params: NominatimSearchParams, operation: string): Promise<NominatimSearchItem[]> {
    const finalParams = this.cleanParams({
      ...params,
      format: 'json',
      addressdetails: 1,
      extratags: 1,
      namedetails: 1,
      countrycodes: env.COUNTRY_CODE,
    })

    return this.retryPolicy.execute(
      async () => {
        await this.gate.waitTurn(GeoBackend.NOMINATIM)

        const response = await NominatimGeoProvider.api.get<unknown>('/search', { params: finalParams })
        const parsed = nominatimResponseSchema.safeParse(response.data)

        if (!parsed.success) {
          throw new MalformedProviderPayloadError(
            'nominatim',
            parsed.error.issues.map((issue) => issue.message),
          )
        }

        logger.debug({ operation, results: parsed.data.length }, 'Nominatim request succeeded')
        return parsed.data
      },
      [],
      { provider: 'nominatim', operation },
    )
  }

  private toCandidates(items: NominatimSearchItem[], providerId: ProviderId): GeoCandidate[] {
    const candidates: GeoCandidate[] = []

    for (const item of items) {
      const lat = Number.parseFloat(item.lat)
      const lng = Number.parseFloat(item.lon)

      if (Number.isNaN(lat) || Number.isNaN(lng)) {
        logger.warn({ lat: item.lat, lon: item.lon }, 'Invalid coordinates received from Nominatim')
        continue
      }

      const address = item.address ?? {}

      candidates.push({
        lat,
        lng,
        displayText: item.display_name,
        providerId,
        metadata: {
          houseNumber: address.house_number,
          road: address.road ?? address.pedestrian ?? address.street,
          city: address.city ?? address.town ?? address.village ?? address.municipality,
          osmType: item.osm_type,
          resultClass: item.class,
          resultType: item.type,
          rawLat: item.lat,
          rawLng: item.lon,
          precision: PrecisionHelper.fromOsm(item),
        },
      })
    }

    return candidates
  }

  private cleanParams(params: NominatimSearchParams): Record<string, string | number> {
    const cleaned: Record<string, string | number> = {}
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) continue
      if (typeof value === 'string' && value.trim().length === 0) continue
      cleaned[key] = typeof value === 'string' ? value.trim() : value
    }
    return cleaned
  }
}
