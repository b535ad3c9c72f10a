import fastify from 'fastify'
import cors from '@fastify/cors'
import swagger from '@fastify/swagger'
import swaggerUi from '@fastify/swagger-ui'
import sensible from '@fastify/sensible'
import {
  serializerCompiler,
  validatorCompiler,
  ZodTypeProvider,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'

import type { Logger } from './lib/logger'
import type { Station } from './modules/station/station'

// Plugins
import stationPlugin from './plugins/station'

// Routes
import statusRoutes from './modules/status/routes'

export interface BuildAppOptions {
  station: Station
  logger: Logger
  docs?: boolean
}

/**
 * Status server. A passive reporter: it is handed the station and only reads from it.
 */
export async function buildApp({ station, logger, docs = true }: BuildAppOptions) {
  const app = fastify({
    loggerInstance: logger,
    disableRequestLogging: true, // Request logs are too verbose for a field device
  }).withTypeProvider<ZodTypeProvider>()

  // Validation
  app.setValidatorCompiler(validatorCompiler)
  app.setSerializerCompiler(serializerCompiler)

  // Sensible (HTTP Errors)
  await app.register(sensible)

  // CORS
  await app.register(cors, {
    origin: '*',
    methods: ['GET'],
  })

  if (docs) {
    await app.register(swagger, {
      openapi: {
        info: {
          title: 'Garden Station API',
          description: 'Status of the irrigation station controller',
          version: '1.0.0',
        },
        servers: [],
      },
      transform: jsonSchemaTransform,
    })

    await app.register(swaggerUi, {
      routePrefix: '/documentation',
    })
  }

  await app.register(stationPlugin, { station })

  // Routes
  await app.register(statusRoutes, { prefix: '/api' })

  app.get('/health', async () => {
    return { status: 'ok' }
  })

  return app
}
