import { describe, it, expect } from 'vitest'
import { CommanderError } from 'commander'
import { resolveConfig } from '../cli'

const argv = (...args: string[]) => ['node', 'garden-station', ...args]

describe('resolveConfig', () => {
    it('should fall back to the environment when no flag is given', () => {
        const config = resolveConfig(argv(), { STATION_NAME: 'greenhouse', MQTT_BROKER: 'broker.test' })

        expect(config.station.name).toBe('greenhouse')
        expect(config.mqtt.broker).toBe('mqtt://broker.test')
        expect(config.station.mock).toBe(false)
    })

    it('should let flags override the environment', () => {
        const config = resolveConfig(
            argv(
                '--mock',
                '--mqtt-broker',
                'otto',
                '--station-name',
                'balcony',
                '--log-output',
                'stdout',
                '--log-format',
                'json',
                '--api-port',
                '8011'
            ),
            { STATION_NAME: 'greenhouse', LOG_OUTPUT: 'file' }
        )

        expect(config.station).toEqual({ name: 'balcony', mock: true })
        expect(config.mqtt.broker).toBe('mqtt://otto')
        expect(config.log).toMatchObject({ output: 'stdout', format: 'json' })
        expect(config.api.port).toBe(8011)
    })

    it('should keep MOCK from the environment when --mock is absent', () => {
        expect(resolveConfig(argv(), { MOCK: 'true' }).station.mock).toBe(true)
    })

    it('should reject a log level outside the allowed choices', () => {
        expect(() => resolveConfig(argv('--log-level', 'loud'), {})).toThrow(CommanderError)
    })
})
