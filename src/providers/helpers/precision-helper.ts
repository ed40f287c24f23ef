import { GeoPrecision } from '@providers/geo-provider/geo-provider.interface'

// Loose shape of raw Nominatim rows
interface OsmRawData {
  place_rank?: string | number
  type?: string
  class?: string
  addresstype?: string
}

export class PrecisionHelper {
  /**
   * OpenStreetMap results (Nominatim).
   */
  static fromOsm(data: OsmRawData): GeoPrecision {
    const rank = Number(data.place_rank) || 0
    const type = data.type || ''
    const category = data.class || ''

    // Rank 30 = address point or building
    if (rank >= 30 || ['house', 'building', 'apartments'].includes(type) || category === 'building') {
      return GeoPrecision.ROOFTOP
    }

    // Rank 26-29 = street
    if (rank >= 26 || category === 'highway') return GeoPrecision.STREET

    // Rank 16-25 = villages, quarters, districts
    if (rank >= 16 || ['neighbourhood', 'suburb', 'quarter', 'hamlet'].includes(type) || data.addresstype === 'suburb') {
      return GeoPrecision.NEIGHBORHOOD
    }

    return GeoPrecision.CITY
  }

  /**
   * Overpass elements: nodes are points, ways and relations only carry a computed center.
   */
  static fromOverpass(elementType: string): GeoPrecision {
    return elementType === 'node' ? GeoPrecision.ROOFTOP : GeoPrecision.STREET
  }

  /**
   * Google Geocoding `geometry.location_type`.
   */
  static fromGoogle(locationType: string): GeoPrecision {
    switch (locationType) {
      case 'ROOFTOP':
        return GeoPrecision.ROOFTOP
      case 'RANGE_INTERPOLATED':
        return GeoPrecision.STREET
      case 'GEOMETRIC_CENTER':
        return GeoPrecision.NEIGHBORHOOD
      default:
        return GeoPrecision.CITY
    }
  }
}
