import type { FastifyInstance } from 'fastify'
import { geocodeRoutes } from '@controllers/geocode/geocode.routes'
import { healthCheckRoutes } from '@controllers/health-check/health-check.routes'

export async function appRoutes(app: FastifyInstance) {
  app.register(geocodeRoutes, { prefix: '/geocode' })
  app.register(healthCheckRoutes, { prefix: '/health' })
}
