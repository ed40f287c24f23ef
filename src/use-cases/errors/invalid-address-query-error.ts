import { messages } from '@constants/messages'

export class InvalidAddressQueryError extends Error {
  constructor() {
    super(messages.validation.emptyAddressQuery)
  }
}
