/**
 * Device Registry
 *
 * Maps logical device names to device handles. Populated once during station init and
 * read-only afterwards. Performs no I/O.
 */
import type { Device, DeviceKind } from './types/device'
import { DuplicateNameError, NotFoundError } from '../lib/errors'

export class DeviceRegistry<D extends Device = Device> {
  private devices = new Map<string, D>()

  /**
   * Register a device under its name
   */
  add(device: D): void {
    if (this.devices.has(device.name)) {
      throw new DuplicateNameError(device.name)
    }
    this.devices.set(device.name, device)
  }

  /**
   * Get a device by name
   */
  get(name: string): D {
    const device = this.devices.get(name)
    if (!device) {
      throw new NotFoundError(name)
    }
    return device
  }

  has(name: string): boolean {
    return this.devices.has(name)
  }

  /**
   * All devices, in registration order
   */
  list(): D[] {
    return Array.from(this.devices.values())
  }

  byKind(kind: DeviceKind): D[] {
    return this.list().filter(d => d.kind === kind)
  }

  get size(): number {
    return this.devices.size
  }
}
