import { RateLimiterMemory, RateLimiterQueue } from 'rate-limiter-flexible'
import { logger } from '@lib/logger'
import { THROTTLE_WINDOWS } from '@constants/resolution-policy'

/**
 * Spaces requests to each geocoding backend.
 *
 * One in-process queue per backend: callers await their turn instead of being
 * rejected, so a sequential batch never exceeds the backend's published limit.
 * The backend key MUST be one of the static GeoBackend values.
 */

export enum GeoBackend {
  NOMINATIM = 'nominatim',
  OVERPASS = 'overpass',
  GOOGLE = 'google',
}

type BackendWindow = {
  points: number
  windowSeconds: number
}

export interface RequestGate {
  waitTurn(backend: GeoBackend): Promise<void>
}

export class RequestThrottle implements RequestGate {
  private readonly MAX_QUEUE_SIZE = 100

  private readonly queues = new Map<GeoBackend, RateLimiterQueue>()

  constructor(private readonly windows: Record<GeoBackend, BackendWindow> = THROTTLE_WINDOWS) {}

  async waitTurn(backend: GeoBackend): Promise<void> {
    const queue = this.getQueue(backend)
    const remaining = await queue.removeTokens(1)

    logger.trace({ backend, remaining }, 'Throttle turn granted')
  }

  private getQueue(backend: GeoBackend): RateLimiterQueue {
    const existing = this.queues.get(backend)
    if (existing) return existing

    const window = this.windows[backend]
    const limiter = new RateLimiterMemory({
      keyPrefix: `throttle:${backend}`,
      points: window.points,
      duration: window.windowSeconds,
    })
    const queue = new RateLimiterQueue(limiter, { maxQueueSize: this.MAX_QUEUE_SIZE })

    this.queues.set(backend, queue)

    return queue
  }
}
