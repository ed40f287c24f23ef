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
import { BoundingBox, CityBoundsResolver, GeoCandidate, PoiGeocodingProvider } from './geo-provider.interface'

const pointSchema = z.object({ lat: z.number(), lon: z.number() })

const overpassElementSchema = z.object({
  type: z.string(),
  id: z.number(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  center: pointSchema.optional(),
  tags: z.record(z.string(), z.string()).optional(),
})

const overpassResponseSchema = z.object({
  elements: z.array(overpassElementSchema),
})

type OverpassElement = z.infer<typeof overpassElementSchema>

type ScoredElement = {
  element: OverpassElement
  score: number
}

/**
 * Point-of-interest search for medical facilities inside a settlement's bounding box.
 */
export class OverpassPoiProvider implements PoiGeocodingProvider {
  private static api: AxiosInstance

  private readonly OVERPASS_TIMEOUT = 30000
  private readonly QUERY_TIMEOUT_SECONDS = 25

  // Element scoring
  private readonly EXACT_NAME_SCORE = 60
  private readonly PARTIAL_NAME_SCORE = 50
  private readonly HOSPITAL_SCORE = 30
  private readonly CLINIC_SCORE = 20
  private readonly MIN_ELEMENT_SCORE = 30

  constructor(
    private readonly gate: RequestGate,
    private readonly cityBounds: CityBoundsResolver,
    private readonly retryPolicy: RetryPolicy = new RetryPolicy(),
  ) {
    if (!OverpassPoiProvider.api) {
      OverpassPoiProvider.api = createHttpClient({
        baseURL: env.OVERPASS_API_URL,
        timeout: this.OVERPASS_TIMEOUT,
      })
    }
  }

  async searchByName(nameHint: string, city: string, limit: number): Promise<GeoCandidate[]> {
    const bounds = await this.cityBounds.resolveCityBounds(city)

    if (!bounds) {
      logger.info({ nameHint, city }, 'Skipping POI search without settlement bounds')
      return []
    }

    const elements = await this.performRequest(this.buildQuery(nameHint, bounds))

    const scored = elements
      .map((element): ScoredElement => ({ element, score: this.scoreElement(element, nameHint) }))
      .filter((entry) => entry.score >= this.MIN_ELEMENT_SCORE)
      .sort((a, b) => b.score - a.score)

    const candidates: GeoCandidate[] = []
    for (const { element } of scored) {
      const candidate = this.toCandidate(element, city)
      if (candidate) candidates.push(candidate)
      if (candidates.length >= limit) break
    }

    return candidates
  }

  buildQuery(nameHint: string, bounds: BoundingBox): string {
    const bbox = `${bounds.south},${bounds.west},${bounds.north},${bounds.east}`
    const name = this.escapeRegex(nameHint.trim())

    return [
      `[out:json][timeout:${this.QUERY_TIMEOUT_SECONDS}];`,
      '(',
      `  nwr["name"~"${name}",i]["amenity"~"hospital|clinic|doctors"](${bbox});`,
      `  nwr["name"~"МБАЛ|болница",i]["amenity"~"hospital|clinic"](${bbox});`,
      ');',
      'out center;',
    ].join('\n')
  }

  scoreElement(element: OverpassElement, nameHint: string): number {
    const tags = element.tags ?? {}
    const elementName = (tags.name ?? '').toLowerCase()
    const wanted = nameHint.trim().toLowerCase()

    let score = 0
    if (elementName && elementName === wanted) {
      score += this.EXACT_NAME_SCORE
    } else if (elementName && wanted && (elementName.includes(wanted) || wanted.includes(elementName))) {
      score += this.PARTIAL_NAME_SCORE
    }

    if (tags.amenity === 'hospital') {
      score += this.HOSPITAL_SCORE
    } else if (tags.amenity === 'clinic' || tags.amenity === 'doctors') {
      score += this.CLINIC_SCORE
    }

    return score
  }

  private async performRequest(query: string): Promise<OverpassElement[]> {
    return this.retryPolicy.execute(
      async () => {
        await this.gate.waitTurn(GeoBackend.OVERPASS)

        const response = await OverpassPoiProvider.api.post<unknown>(
          '/interpreter',
          new URLSearchParams({ data: query }).toString(),
          { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } },
        )
        const parsed = overpassResponseSchema.safeParse(response.data)

        if (!parsed.success) {
          throw new MalformedProviderPayloadError(
            'overpass',
            parsed.error.issues.map((issue) => issue.message),
          )
        }

        logger.debug({ results: parsed.data.elements.length }, 'Overpass request succeeded')
        return parsed.data.elements
      },
      [],
      { provider: 'overpass', operation: 'searchByName' },
    )
  }

  private toCandidate(element: OverpassElement, city: string): GeoCandidate | null {
    const point =
      element.lat !== undefined && element.lon !== undefined ? { lat: element.lat, lon: element.lon } : element.center

    if (!point) return null

    const tags = element.tags ?? {}
    const street = [tags['addr:street'], tags['addr:housenumber']].filter(Boolean).join(' ')
    const displayText = [tags.name ?? 'Unknown', street, tags['addr:city'] ?? city].filter(Boolean).join(', ')

    return {
      lat: point.lat,
      lng: point.lon,
      displayText,
      providerId: ProviderId.OVERPASS,
      metadata: {
        houseNumber: tags['addr:housenumber'],
        road: tags['addr:street'],
        // Elements rarely carry addr:city; the bounding box already pins the settlement
        city: tags['addr:city'] ?? city,
        osmType: element.type,
        resultClass: 'amenity',
        resultType: tags.amenity,
        rawLat: String(point.lat),
        rawLng: String(point.lon),
        precision: PrecisionHelper.fromOverpass(element.type),
      },
    }
  }

  private escapeRegex(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/"/g, '\\"')
  }
}
