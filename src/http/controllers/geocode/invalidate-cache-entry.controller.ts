import { FastifyReply, FastifyRequest } from 'fastify'
import { messages } from '@constants/messages'
import { addressBodySchema } from '@http/schemas/geocode/address-body-schema'
import { normalizeAddressRow } from '@lib/address/address-normalizer'
import { makeInvalidateCacheEntryUseCase } from '@use-cases/factories/make-invalidate-cache-entry-use-case'

export async function invalidateCacheEntry(request: FastifyRequest, reply: FastifyReply) {
  const body = addressBodySchema.parse(request.body)
  const query = normalizeAddressRow(body)

  const invalidateCacheEntryUseCase = await makeInvalidateCacheEntryUseCase()
  const { key, deleted } = await invalidateCacheEntryUseCase.execute(query)

  return reply.status(deleted ? 200 : 404).send({
    key,
    deleted,
    message: deleted ? messages.info.cacheEntryDeleted : messages.info.cacheEntryNotFound,
  })
}
