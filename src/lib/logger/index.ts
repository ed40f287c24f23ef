import { AsyncLocalStorage } from 'node:async_hooks'
import pino from 'pino'
import { env } from '@env/index'

interface LogContext {
  requestId?: string
  rowIndex?: number
}

const logContext = new AsyncLocalStorage<LogContext>()

export const logger = pino({
  name: env.APP_NAME,
  level: env.LOG_LEVEL,
  transport:
    env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
      : undefined,
  // Tags every line written inside runWithRequestId / runWithRowContext
  mixin() {
    return logContext.getStore() ?? {}
  },
})

export function runWithRequestId<T>(requestId: string, fn: () => T): T {
  return logContext.run({ ...logContext.getStore(), requestId }, fn)
}

export function runWithRowContext<T>(rowIndex: number, fn: () => T): T {
  return logContext.run({ ...logContext.getStore(), rowIndex }, fn)
}

export function getLogContext(): LogContext | undefined {
  return logContext.getStore()
}
