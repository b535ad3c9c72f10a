/**
 * Poller Service - payload encoders for sensor readings
 */
import { z } from 'zod'
import type { EnvironmentReading } from '../../core/types/device'
import { EncodeError } from '../../lib/errors'

export type Encoder<T> = (reading: T) => string | Buffer

export const DECIMAL_WIDTH = 5
export const DECIMAL_PRECISION = 2

/**
 * Fixed-precision decimal, right-aligned: 0.42 -> " 0.42"
 */
export function encodeDecimal(value: number): string {
  if (!Number.isFinite(value)) {
    throw new EncodeError(`Cannot encode non-finite value ${value}`)
  }
  return value.toFixed(DECIMAL_PRECISION).padStart(DECIMAL_WIDTH, ' ')
}

export const EnvironmentReadingSchema = z.object({
  temperature: z.number().finite(),
  humidity: z.number().finite(),
  pressure: z.number().finite(),
})

/**
 * Composite environment reading as a JSON document
 */
export function encodeEnvironment(reading: EnvironmentReading): string {
  const result = EnvironmentReadingSchema.safeParse(reading)
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new EncodeError(`Invalid environment reading (${issues})`)
  }
  const { temperature, humidity, pressure } = result.data
  return JSON.stringify({ temperature, humidity, pressure })
}
