import { messages } from '@constants/messages'

export class ProviderRequestError extends Error {
  constructor(
    public readonly provider: string,
    public readonly reason: string,
    public readonly retryable = false,
  ) {
    super(`${messages.errors.providerRequestError} [${provider}] ${reason}`)
  }
}
