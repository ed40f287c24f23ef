import fastify, { FastifyError } from 'fastify'
import { env } from '@env/index'
import { appRoutes } from '@http/routes'
import { logger, runWithRequestId } from '@lib/logger'
import { logError } from '@lib/logger/helpers'
import { v7 as uuidv7 } from 'uuid'
import z, { ZodError } from 'zod'
import { messages } from '@constants/messages'
import { InvalidAddressQueryError } from '@use-cases/errors/invalid-address-query-error'

export const app = fastify({
  logger: false,
})

app.addHook('onRequest', (request, _reply, done) => {
  const requestId = uuidv7()

  runWithRequestId(requestId, () => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        ip: request.ip,
        userAgent: request.headers['user-agent'],
      },
      'Incoming request',
    )
    done()
  })
})

app.addHook('onResponse', (request, reply, done) => {
  logger.info(
    {
      statusCode: reply.statusCode,
      method: request.method,
      url: request.url,
      requestTime: reply.elapsedTime,
    },
    'Response sent',
  )

  done()
})

app.register(appRoutes)

app.setErrorHandler((error: FastifyError, _request, reply) => {
  if (error instanceof ZodError) {
    logger.debug(z.treeifyError(error), 'Validation error occurred')

    return reply.status(400).send({ message: messages.validation.invalidData, details: z.treeifyError(error) })
  }

  if (error instanceof SyntaxError) {
    logger.warn({ error: error.message }, 'Invalid JSON received')
    return reply.status(400).send({ message: messages.validation.invalidJson })
  }

  if (error instanceof InvalidAddressQueryError) {
    return reply.status(400).send({ message: error.message })
  }

  // Errors fastify raises itself (empty body, unsupported media type...)
  if (typeof error.statusCode === 'number' && error.statusCode < 500) {
    return reply.status(error.statusCode).send({ message: error.message })
  }

  if (env.NODE_ENV === 'development') {
    logError(error, {}, 'Unhandled error occurred')
  } else {
    logger.error({ error: error.message }, 'Unhandled error occurred')
  }

  return reply.status(500).send({ message: messages.errors.internalServer })
})
