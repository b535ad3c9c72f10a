import type {
  Actuator,
  DeviceFactory,
  Display,
  EnvironmentReading,
  InputDevice,
  Sensor,
} from '../../core/types/device'
import { DriverUnavailableError } from '../../lib/errors'
import { MockDeviceFactory } from './mockDrivers'

/**
 * Physical drivers are not bundled with the station; every constructor fails so that a
 * non-mock start aborts at init with the list of missing drivers.
 */
export class HardwareDeviceFactory implements DeviceFactory {
  async button(name: string, pin: number): Promise<InputDevice> {
    throw new DriverUnavailableError(`button ${name} (gpio ${pin})`)
  }

  async relay(name: string, pin: number): Promise<Actuator> {
    throw new DriverUnavailableError(`relay ${name} (gpio ${pin})`)
  }

  async environment(name: string, bus: string, address: number): Promise<Sensor<EnvironmentReading>> {
    throw new DriverUnavailableError(`bme280 ${name} (${bus} 0x${address.toString(16)})`)
  }

  async display(name: string, address: number, bus: number): Promise<Display> {
    throw new DriverUnavailableError(`oled ${name} (i2c-${bus} 0x${address.toString(16)})`)
  }

  async soil(name: string, pin: number): Promise<Sensor<number>> {
    throw new DriverUnavailableError(`vh400 ${name} (gpio ${pin})`)
  }
}

export function createDeviceFactory(mock: boolean): DeviceFactory {
  return mock ? new MockDeviceFactory() : new HardwareDeviceFactory()
}

export * from './mockDrivers'
