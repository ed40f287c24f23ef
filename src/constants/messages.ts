export const messages = {
  validation: {
    invalidData: 'Invalid request data!',
    invalidJson: 'The request body is not valid JSON. Check the structure of the data sent.',
    emptyAddressQuery: 'An address query needs at least a street or a settlement.',
  },
  errors: {
    internalServer: 'Internal server error!',
    noGeoProviderError: 'The resolution engine requires at least one resolution tier.',
    providerRequestError: 'Geocoding provider request failed.',
    malformedProviderPayload: 'Geocoding provider returned a payload that does not match its contract.',
    cacheStoreError: 'Resolution cache store operation failed.',
    invalidCacheDocument: 'Resolution cache document is not a key to entry mapping.',
    invalidOverridesDocument: 'Manual overrides document is not a key to coordinates mapping.',
  },
  info: {
    cacheEntryDeleted: 'Cache entry deleted.',
    cacheEntryNotFound: 'No cache entry exists for this address.',
  },
}

export type Messages = typeof messages
