import axios from 'axios'
import { logger } from '@lib/logger'
import { serializeError } from '@lib/logger/helpers'
import { RETRY_DEFAULTS } from '@constants/resolution-policy'
import { MalformedProviderPayloadError } from '@providers/geo-provider/error/malformed-provider-payload-error'
import { ProviderRequestError } from '@providers/geo-provider/error/provider-request-error'

export interface RetryPolicyOptions {
  maxAttempts: number
  baseDelayMs: number
  sleep?: (ms: number) => Promise<void>
}

export interface RetryContext {
  provider: string
  operation: string
}

const TRANSIENT_STATUSES = new Set([408, 429])

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Bounded retry with linear backoff (baseDelayMs * attempt).
 * A 429 carrying Retry-After waits for the advertised time instead.
 * The policy never throws: once attempts run out, or on a non-transient failure, it returns the fallback.
 */
export class RetryPolicy {
  readonly maxAttempts: number
  readonly baseDelayMs: number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? RETRY_DEFAULTS.maxAttempts)
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? RETRY_DEFAULTS.baseDelayMs)
    this.sleep = options.sleep ?? defaultSleep
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, fallback: T, context: RetryContext): Promise<T> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await operation(attempt)
      } catch (error) {
        const transient = this.isTransient(error)
        const status = this.statusOf(error)

        if (!transient || attempt === this.maxAttempts) {
          logger.error(
            { ...context, attempt, status, transient, error: serializeError(error) },
            'Provider request failed, giving up',
          )
          return fallback
        }

        const delay = this.computeDelayMs(attempt, error)
        logger.warn({ ...context, attempt, delay, status, error: serializeError(error) }, 'Retrying provider request')
        await this.sleep(delay)
      }
    }

    return fallback
  }

  isTransient(error: unknown): boolean {
    if (error instanceof MalformedProviderPayloadError) return true
    if (error instanceof ProviderRequestError) return error.retryable

    if (axios.isAxiosError(error)) {
      const status = error.response?.status
      // No response means a network failure or a timeout
      if (status === undefined) return true
      return status >= 500 || TRANSIENT_STATUSES.has(status)
    }

    return false
  }

  computeDelayMs(attempt: number, error?: unknown): number {
    if (axios.isAxiosError(error) && error.response?.status === 429) {
      const retryAfter = this.parseRetryAfterMs(error.response.headers['retry-after'])
      if (retryAfter !== null) return retryAfter
    }

    return this.baseDelayMs * attempt
  }

  private statusOf(error: unknown): number | undefined {
    return axios.isAxiosError(error) ? error.response?.status : undefined
  }

  private parseRetryAfterMs(value: unknown): number | null {
    if (typeof value !== 'string') return null
    const asSeconds = Number.parseInt(value, 10)
    if (Number.isFinite(asSeconds) && asSeconds >= 0) return asSeconds * 1000
    const asDate = Date.parse(value)
    if (!Number.isNaN(asDate)) {
      const delta = asDate - Date.now()
      return delta > 0 ? delta : 0
    }
    return null
  }
}
