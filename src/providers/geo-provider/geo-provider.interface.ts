export enum GeoPrecision {
  ROOFTOP = 'ROOFTOP',
  STREET = 'STREET',
  NEIGHBORHOOD = 'NEIGHBORHOOD',
  CITY = 'CITY',
}

/**
 * Fields a backend exposes about one result. Every field is optional because
 * backends disagree on what they return.
 */
export interface CandidateMetadata {
  houseNumber?: string
  road?: string
  city?: string
  osmType?: string
  resultClass?: string
  resultType?: string
  // Coordinates as the backend printed them, for decimal-precision checks
  rawLat: string
  rawLng: string
  precision: GeoPrecision
}

export interface GeoCandidate {
  lat: number
  lng: number
  displayText: string
  providerId: string
  metadata: CandidateMetadata
}

export interface StructuredSearchOptions {
  street: string
  city: string
  houseNumber?: string
}

export interface BoundingBox {
  south: number
  west: number
  north: number
  east: number
}

export interface GeocodingProvider {
  search(query: string, limit: number): Promise<GeoCandidate[]>
}

export interface StructuredGeocodingProvider extends GeocodingProvider {
  searchStructured(options: StructuredSearchOptions, limit: number): Promise<GeoCandidate[]>
}

export interface PoiGeocodingProvider {
  searchByName(nameHint: string, city: string, limit: number): Promise<GeoCandidate[]>
}

export interface CityBoundsResolver {
  resolveCityBounds(city: string): Promise<BoundingBox | null>
}
