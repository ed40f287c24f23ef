import { vi } from 'vitest'
import { RequestGate } from '@lib/rate-limit/request-throttle'

export function makeStubGate(): RequestGate {
  return { waitTurn: vi.fn().mockResolvedValue(undefined) }
}
