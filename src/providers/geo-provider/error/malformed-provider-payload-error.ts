import { messages } from '@constants/messages'

export class MalformedProviderPayloadError extends Error {
  constructor(
    public readonly provider: string,
    public readonly issues: string[] = [],
  ) {
    super(`${messages.errors.malformedProviderPayload} [${provider}]`)
  }
}
