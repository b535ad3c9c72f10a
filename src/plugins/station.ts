import fp from 'fastify-plugin'
import { FastifyInstance } from 'fastify'
import type { Station } from '../modules/station/station'

declare module 'fastify' {
  interface FastifyInstance {
    station: Station
  }
}

export interface StationPluginOptions {
  station: Station
}

// The status server only reads from the station; it never drives its lifecycle
export default fp<StationPluginOptions>(async (fastify: FastifyInstance, opts) => {
  fastify.decorate('station', opts.station)
})
