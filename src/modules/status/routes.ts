import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { StatusController } from './controller'
import {
  DeviceListResponseSchema,
  DeviceParamsSchema,
  DeviceSchema,
  StationStatusResponseSchema,
} from './schema'

const statusRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const controller = new StatusController(fastify)

  // GET /station - Station state snapshot
  app.get(
    '/station',
    {
      schema: {
        tags: ['Station'],
        summary: 'Get station status',
        response: {
          200: StationStatusResponseSchema,
        },
      },
    },
    controller.getStation
  )

  // GET /devices - List registered devices
  app.get(
    '/devices',
    {
      schema: {
        tags: ['Station'],
        summary: 'List registered devices',
        response: {
          200: DeviceListResponseSchema,
        },
      },
    },
    controller.listDevices
  )

  // GET /devices/:name - One device
  app.get(
    '/devices/:name',
    {
      schema: {
        tags: ['Station'],
        summary: 'Get a registered device',
        params: DeviceParamsSchema,
        response: {
          200: DeviceSchema,
        },
      },
    },
    controller.getDevice
  )
}

export default statusRoutes
