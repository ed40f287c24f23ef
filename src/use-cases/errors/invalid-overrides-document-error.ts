import { messages } from '@constants/messages'

export class InvalidOverridesDocumentError extends Error {
  constructor(public readonly source: string) {
    super(`${messages.errors.invalidOverridesDocument} (${source})`)
  }
}
