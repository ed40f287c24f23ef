import { logger } from '@lib/logger'

type SerializedError = {
  name?: string
  message: string
  stack?: string
  code?: string
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined

    return { name: error.name, message: error.message, stack: error.stack, code }
  }

  if (typeof error === 'string') return { message: error }

  try {
    return { message: JSON.stringify(error) }
  } catch {
    return { message: String(error) }
  }
}

export function logError(error: unknown, context: Record<string, unknown>, message: string): void {
  logger.error({ ...context, error: serializeError(error) }, message)
}
