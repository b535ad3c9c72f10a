import { z } from 'zod'

export const DeviceKindSchema = z.enum(['sensor', 'actuator', 'display', 'input'])

export const DeviceSchema = z.object({
  name: z.string(),
  kind: DeviceKindSchema,
})

export const DeviceParamsSchema = z.object({
  name: z.string(),
})

export const DeviceListResponseSchema = z.object({
  devices: z.array(DeviceSchema),
  count: z.number(),
})

export const PollingJobSchema = z.object({
  device: z.string(),
  topic: z.string(),
  intervalMs: z.number(),
  cycles: z.number(),
  failures: z.number(),
  lastPublishedAt: z.date().nullable(),
})

export const StationStatusResponseSchema = z.object({
  name: z.string(),
  mock: z.boolean(),
  state: z.enum(['created', 'initialized', 'running', 'stopped']),
  startedAt: z.date().nullable(),
  connected: z.boolean(),
  devices: z.array(DeviceSchema),
  polling: z.array(PollingJobSchema),
  routes: z.array(z.string()),
})
