import type { FastifyRequest, FastifyReply } from 'fastify'
import { logger } from '@lib/logger'
import { logError } from '@lib/logger/helpers'
import { makeGetCacheStatsUseCase } from '@use-cases/factories/make-get-cache-stats-use-case'

export async function healthCheck(_request: FastifyRequest, reply: FastifyReply) {
  const memoryUsage = process.memoryUsage()

  const startTime = Date.now()
  try {
    const getCacheStatsUseCase = await makeGetCacheStatsUseCase()
    const { size, degraded } = getCacheStatsUseCase.execute()

    const uptime = process.uptime()
    const timestamp = new Date().toISOString()
    const duration = Date.now() - startTime

    logger.info({ uptime, duration, cacheSize: size, degraded }, 'Healthcheck successful')

    return reply.status(200).send({
      status: degraded ? 'degraded' : 'ok',
      uptime,
      timestamp,
      cache: { size, degraded },
      memory: {
        rss: `${Math.round(memoryUsage.rss / 1024 / 1024)}MB`,
        heapUsed: `${Math.round(memoryUsage.heapUsed / 1024 / 1024)}MB`,
      },
    })
  } catch (error) {
    const duration = Date.now() - startTime
    logError(error, { duration }, 'Healthcheck failed')

    return reply.status(500).send({ status: 'error', message: 'Internal healthcheck error' })
  }
}
