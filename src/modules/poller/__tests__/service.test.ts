/**
 * Unit tests for sensor payload encoders
 */
import { describe, it, expect } from 'vitest'
import { encodeDecimal, encodeEnvironment } from '../service'
import { EncodeError } from '../../../lib/errors'

describe('encodeDecimal', () => {
    it('should right-align two decimals in a width of five', () => {
        expect(encodeDecimal(0.42)).toBe(' 0.42')
        expect(encodeDecimal(0.42)).toHaveLength(5)
    })

    it('should round to two decimals', () => {
        expect(encodeDecimal(0.4200)).toBe(' 0.42')
        expect(encodeDecimal(0.3)).toBe(' 0.30')
        expect(encodeDecimal(0)).toBe(' 0.00')
    })

    it('should not pad values that already fill the width', () => {
        expect(encodeDecimal(12.5)).toBe('12.50')
        expect(encodeDecimal(-0.5)).toBe('-0.50')
    })

    it('should let wider values overflow the width', () => {
        expect(encodeDecimal(123.456)).toBe('123.46')
    })

    it.each([NaN, Infinity, -Infinity])('should refuse %s', value => {
        expect(() => encodeDecimal(value)).toThrow(EncodeError)
    })
})

describe('encodeEnvironment', () => {
    it('should serialize the three fields as JSON', () => {
        const payload = encodeEnvironment({ temperature: 21.5, humidity: 45, pressure: 1013.25 })

        expect(payload).toBe('{"temperature":21.5,"humidity":45,"pressure":1013.25}')
    })

    it('should drop fields that are not part of the reading', () => {
        const reading = { temperature: 20, humidity: 50, pressure: 1000, altitude: 12 }

        expect(JSON.parse(encodeEnvironment(reading))).toEqual({ temperature: 20, humidity: 50, pressure: 1000 })
    })

    it('should fail with EncodeError on a non-finite field', () => {
        expect(() => encodeEnvironment({ temperature: NaN, humidity: 45, pressure: 1013 })).toThrow(EncodeError)
        expect(() => encodeEnvironment({ temperature: 20, humidity: Infinity, pressure: 1013 })).toThrow(
            /humidity/
        )
    })
})
