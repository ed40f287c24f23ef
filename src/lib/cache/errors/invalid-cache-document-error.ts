import { messages } from '@constants/messages'

export class InvalidCacheDocumentError extends Error {
  constructor(public readonly source: string) {
    super(`${messages.errors.invalidCacheDocument} (${source})`)
  }
}
