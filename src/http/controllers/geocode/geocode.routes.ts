import { FastifyInstance } from 'fastify'
import { resolveAddress } from './resolve-address.controller'
import { invalidateCacheEntry } from './invalidate-cache-entry.controller'

export async function geocodeRoutes(app: FastifyInstance) {
  app.post('/resolve', resolveAddress)

  app.delete('/cache', invalidateCacheEntry)
}
