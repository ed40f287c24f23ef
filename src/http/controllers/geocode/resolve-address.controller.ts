import { FastifyReply, FastifyRequest } from 'fastify'
import { addressBodySchema } from '@http/schemas/geocode/address-body-schema'
import { normalizeAddressRow } from '@lib/address/address-normalizer'
import { logger } from '@lib/logger'
import { makeResolveAddressUseCase } from '@use-cases/factories/make-resolve-address-use-case'

export async function resolveAddress(request: FastifyRequest, reply: FastifyReply) {
  const body = addressBodySchema.parse(request.body)
  const query = normalizeAddressRow(body)

  logger.info({ key: query.cacheKey }, 'Resolving address')

  const resolveAddressUseCase = await makeResolveAddressUseCase()
  const result = await resolveAddressUseCase.execute(query)

  return reply.status(200).send({ key: query.cacheKey, result })
}
