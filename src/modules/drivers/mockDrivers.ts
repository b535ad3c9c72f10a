/**
 * Software-only drivers used in mock mode and in tests.
 */
import { EventEmitter } from 'events'
import type {
  Actuator,
  DeviceFactory,
  Display,
  EdgeHandler,
  EdgeType,
  EnvironmentReading,
  InputDevice,
  Sensor,
  SimulatedSensor,
  Subscription,
  SyntheticSignal,
} from '../../core/types/device'
import { InvalidCommandError } from '../../lib/errors'

// ============================================================================
// Signal
// ============================================================================

export class MemorySignal implements SyntheticSignal {
  constructor(private value: number) {}

  async get(): Promise<number> {
    return this.value
  }

  async set(value: number): Promise<void> {
    this.value = value
  }
}

// ============================================================================
// Button
// ============================================================================

export class MockButton implements InputDevice {
  readonly kind = 'input'
  private edges = new EventEmitter()

  constructor(
    readonly name: string,
    readonly pin: number
  ) {}

  registerEdgeHandler(handler: EdgeHandler): Subscription {
    const listener = (type: EdgeType) => handler({ device: this.name, type, time: new Date() })
    this.edges.on('edge', listener)
    return {
      unsubscribe: () => {
        this.edges.off('edge', listener)
      },
    }
  }

  emit(type: EdgeType): void {
    this.edges.emit('edge', type)
  }

  /**
   * A full press: rising then falling edge
   */
  press(): void {
    this.emit('rising')
    this.emit('falling')
  }

  get listenerCount(): number {
    return this.edges.listenerCount('edge')
  }
}

// ============================================================================
// Relay
// ============================================================================

export class MockRelay implements Actuator {
  readonly kind = 'actuator'
  isOn = false

  constructor(
    readonly name: string,
    readonly pin: number
  ) {}

  async handleMessage(payload: Buffer): Promise<void> {
    const command = payload.toString().trim().toLowerCase()
    switch (command) {
      case 'on':
        this.isOn = true
        break
      case 'off':
        this.isOn = false
        break
      default:
        throw new InvalidCommandError(this.name, command)
    }
  }
}

// ============================================================================
// Environment sensor
// ============================================================================

export const DEFAULT_ENVIRONMENT: EnvironmentReading = {
  temperature: 21.5,
  humidity: 45,
  pressure: 1013.25,
}

export class MockEnvironmentSensor implements Sensor<EnvironmentReading> {
  readonly kind = 'sensor'
  reading: EnvironmentReading

  constructor(
    readonly name: string,
    readonly bus: string,
    readonly address: number,
    reading: EnvironmentReading = DEFAULT_ENVIRONMENT
  ) {
    this.reading = { ...reading }
  }

  async get(): Promise<EnvironmentReading> {
    return { ...this.reading }
  }
}

// ============================================================================
// Display
// ============================================================================

export class MockDisplay implements Display {
  readonly kind = 'display'
  text = ''

  constructor(
    readonly name: string,
    readonly address: number,
    readonly bus: number
  ) {}

  async handleMessage(payload: Buffer): Promise<void> {
    this.text = payload.toString()
  }

  async clear(): Promise<void> {
    this.text = ''
  }
}

// ============================================================================
// Soil sensor
// ============================================================================

export const DEFAULT_SOIL_VALUE = 0.3

export class MockSoilSensor implements SimulatedSensor {
  readonly kind = 'sensor'
  readonly signal: SyntheticSignal

  constructor(
    readonly name: string,
    readonly pin: number,
    signal: SyntheticSignal = new MemorySignal(DEFAULT_SOIL_VALUE)
  ) {
    this.signal = signal
  }

  get(): Promise<number> {
    return this.signal.get()
  }
}

// ============================================================================
// Factory
// ============================================================================

export class MockDeviceFactory implements DeviceFactory {
  async button(name: string, pin: number): Promise<MockButton> {
    return new MockButton(name, pin)
  }

  async relay(name: string, pin: number): Promise<MockRelay> {
    return new MockRelay(name, pin)
  }

  async environment(name: string, bus: string, address: number): Promise<MockEnvironmentSensor> {
    return new MockEnvironmentSensor(name, bus, address)
  }

  async display(name: string, address: number, bus: number): Promise<MockDisplay> {
    return new MockDisplay(name, address, bus)
  }

  async soil(name: string, pin: number): Promise<MockSoilSensor> {
    return new MockSoilSensor(name, pin)
  }
}
