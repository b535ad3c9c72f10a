import { FastifyInstance, FastifyRequest } from 'fastify'
import { z } from 'zod'
import { DeviceParamsSchema, DeviceListResponseSchema, StationStatusResponseSchema } from './schema'

type DeviceParams = z.infer<typeof DeviceParamsSchema>
type DeviceListResponse = z.infer<typeof DeviceListResponseSchema>
type StationStatusResponse = z.infer<typeof StationStatusResponseSchema>

/**
 * Read-only views over the station. Never triggers device I/O.
 */
export class StatusController {
  constructor(private fastify: FastifyInstance) {}

  getStation = async (): Promise<StationStatusResponse> => {
    return this.fastify.station.status()
  }

  listDevices = async (): Promise<DeviceListResponse> => {
    const { devices } = this.fastify.station.status()
    return { devices, count: devices.length }
  }

  getDevice = async (req: FastifyRequest<{ Params: DeviceParams }>) => {
    const { registry } = this.fastify.station
    if (!registry.has(req.params.name)) {
      throw this.fastify.httpErrors.notFound(`Device ${req.params.name} not found`)
    }
    const device = registry.get(req.params.name)
    return { name: device.name, kind: device.kind }
  }
}
