/**
 * Core device types.
 * Drivers are external collaborators: the station only sees these capability contracts.
 */

// ============================================================================
// Device
// ============================================================================

export type DeviceKind = 'sensor' | 'actuator' | 'display' | 'input'

export interface Device {
  readonly name: string
  readonly kind: DeviceKind
}

export interface Subscription {
  unsubscribe(): void
}

// ============================================================================
// Capabilities
// ============================================================================

export interface Sensor<T> extends Device {
  readonly kind: 'sensor'
  get(): Promise<T>
}

export interface Actuator extends Device {
  readonly kind: 'actuator' | 'display'
  handleMessage(payload: Buffer): Promise<void>
}

export interface Display extends Actuator {
  readonly kind: 'display'
  clear(): Promise<void>
}

export type EdgeType = 'rising' | 'falling'

export interface EdgeEvent {
  device: string
  type: EdgeType
  time: Date
}

export type EdgeHandler = (event: EdgeEvent) => void

export interface InputDevice extends Device {
  readonly kind: 'input'
  registerEdgeHandler(handler: EdgeHandler): Subscription
}

// ============================================================================
// Readings
// ============================================================================

export interface EnvironmentReading {
  temperature: number // °C
  humidity: number    // %RH
  pressure: number    // hPa
}

// ============================================================================
// Simulation
// ============================================================================

/**
 * Synthetic value backing a mocked sensor, standing in for the analog pin.
 */
export interface SyntheticSignal {
  get(): Promise<number>
  set(value: number): Promise<void>
}

export interface SimulatedSensor extends Sensor<number> {
  readonly signal: SyntheticSignal
}

export function isSimulated(sensor: Sensor<number>): sensor is SimulatedSensor {
  return 'signal' in sensor && typeof sensor.signal === 'object' && sensor.signal !== null
}

// ============================================================================
// Driver factory
// ============================================================================

export interface DeviceFactory {
  button(name: string, pin: number): Promise<InputDevice>
  relay(name: string, pin: number): Promise<Actuator>
  environment(name: string, bus: string, address: number): Promise<Sensor<EnvironmentReading>>
  display(name: string, address: number, bus: number): Promise<Display>
  soil(name: string, pin: number): Promise<Sensor<number>>
}
