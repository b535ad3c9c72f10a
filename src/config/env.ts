import 'dotenv/config'
import { z } from 'zod'

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform(v => v === 'true' || v === '1' || v === 'yes')

const positiveInt = (fallback: string) =>
  z.string().default(fallback).pipe(z.coerce.number().int().positive())

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const
export const LOG_OUTPUTS = ['stdout', 'stderr', 'file'] as const
export const LOG_FORMATS = ['text', 'json'] as const

export const envSchema = z.object({
  STATION_NAME: z.string().min(1).default('gardener'),
  MOCK: booleanString,
  // Accepts a bare host name like the original flag did ("otto")
  MQTT_BROKER: z
    .string()
    .min(1)
    .default('mqtt://localhost')
    .transform(v => (/^[a-z]+:\/\//i.test(v) ? v : `mqtt://${v}`)),
  MQTT_USERNAME: z.string().optional(),
  MQTT_PASSWORD: z.string().optional(),
  MQTT_CLIENT_ID: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_OUTPUT: z.enum(LOG_OUTPUTS).default('file'),
  LOG_FORMAT: z.enum(LOG_FORMATS).default('text'),
  LOG_FILE: z.string().min(1).default('garden-station.log'),
  API_PORT: z.string().default('3001').pipe(z.coerce.number().int().min(0).max(65535)),
  API_HOST: z.string().default('0.0.0.0'),
  SOIL_INTERVAL_MS: positiveInt('10000'),
  ENV_INTERVAL_MS: positiveInt('10000'),
  SIMULATION_INTERVAL_MS: positiveInt('5000'),
  SIMULATION_DELTA: z.string().default('0.02').pipe(z.coerce.number().finite()),
})

export type EnvSource = Record<string, string | undefined>

export type LogLevel = (typeof LOG_LEVELS)[number]
export type LogOutput = (typeof LOG_OUTPUTS)[number]
export type LogFormat = (typeof LOG_FORMATS)[number]

export interface StationConfig {
  station: {
    name: string
    mock: boolean
  }
  mqtt: {
    broker: string
    username?: string
    password?: string
    clientId: string
    connectTimeout: number
    reconnectPeriod: number
  }
  log: {
    level: LogLevel
    output: LogOutput
    format: LogFormat
    file: string
  }
  api: {
    port: number
    host: string
  }
  polling: {
    soilIntervalMs: number
    envIntervalMs: number
  }
  simulation: {
    intervalMs: number
    delta: number
  }
}

/**
 * Validate an environment map and shape it into the station config.
 * Empty strings count as unset so that blank lines in .env fall back to defaults.
 */
export function parseConfig(source: EnvSource): StationConfig {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  )
  const env = envSchema.parse(cleaned)

  return {
    station: {
      name: env.STATION_NAME,
      mock: env.MOCK,
    },
    mqtt: {
      broker: env.MQTT_BROKER,
      username: env.MQTT_USERNAME,
      password: env.MQTT_PASSWORD,
      clientId: env.MQTT_CLIENT_ID ?? `${env.STATION_NAME}-${process.pid}`,
      connectTimeout: 10000,
      reconnectPeriod: 5000,
    },
    log: {
      level: env.LOG_LEVEL,
      output: env.LOG_OUTPUT,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE,
    },
    api: {
      port: env.API_PORT,
      host: env.API_HOST,
    },
    polling: {
      soilIntervalMs: env.SOIL_INTERVAL_MS,
      envIntervalMs: env.ENV_INTERVAL_MS,
    },
    simulation: {
      intervalMs: env.SIMULATION_INTERVAL_MS,
      delta: env.SIMULATION_DELTA,
    },
  }
}

/**
 * Hardware wiring of the station. Pin numbers are BCM GPIO numbers.
 */
export const hardware = {
  pins: {
    on: 17,
    off: 27,
    soil: 22,
    pump: 5,
  },
  env: {
    bus: '/dev/i2c-1',
    address: 0x76,
  },
  display: {
    address: 0x27,
    bus: 1,
  },
} as const
