import { messages } from '@constants/messages'

export class CacheStoreError extends Error {
  constructor(
    public readonly operation: 'read' | 'write' | 'remove' | 'backup',
    options?: { cause?: unknown },
  ) {
    super(`${messages.errors.cacheStoreError} (${operation})`, options)
  }
}
