/**
 * Station error taxonomy.
 *
 * Fatal-at-init errors abort startup, per-cycle errors are logged by the activity that hit them,
 * and protocol violations are thrown at construction time.
 */

export abstract class StationError extends Error {
  abstract readonly code: string

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

// ============================================================================
// Protocol violations
// ============================================================================

export class DuplicateNameError extends StationError {
  readonly code = 'DUPLICATE_NAME'

  constructor(readonly deviceName: string) {
    super(`Device "${deviceName}" is already registered`)
  }
}

export class NotFoundError extends StationError {
  readonly code = 'NOT_FOUND'

  constructor(readonly deviceName: string) {
    super(`Device "${deviceName}" is not registered`)
  }
}

export class DuplicateRouteError extends StationError {
  readonly code = 'DUPLICATE_ROUTE'

  constructor(readonly topic: string) {
    super(`Topic "${topic}" already has a handler`)
  }
}

export class RoutesLockedError extends StationError {
  readonly code = 'ROUTES_LOCKED'

  constructor(readonly topic: string) {
    super(`Cannot add route ${topic} after the router has started`)
  }
}

export class DuplicatePollingError extends StationError {
  readonly code = 'DUPLICATE_POLLING'

  constructor(readonly deviceName: string) {
    super(`Device "${deviceName}" is already being polled`)
  }
}

export class DuplicateSubscriptionError extends StationError {
  readonly code = 'DUPLICATE_SUBSCRIPTION'

  constructor(readonly deviceName: string) {
    super(`Input "${deviceName}" already has an edge handler`)
  }
}

export class DuplicateSimulationError extends StationError {
  readonly code = 'DUPLICATE_SIMULATION'

  constructor(readonly deviceName: string) {
    super(`Device "${deviceName}" is already being simulated`)
  }
}

export class StationStateError extends StationError {
  readonly code = 'INVALID_STATE'

  constructor(operation: string, readonly state: string) {
    super(`Cannot ${operation} station in state "${state}"`)
  }
}

// ============================================================================
// Recoverable (per cycle / per message)
// ============================================================================

export class EncodeError extends StationError {
  readonly code = 'ENCODE_FAILED'
}

export class NotConnectedError extends StationError {
  readonly code = 'NOT_CONNECTED'

  constructor() {
    super('Not connected to MQTT broker')
  }
}

export class InvalidCommandError extends StationError {
  readonly code = 'INVALID_COMMAND'

  constructor(readonly deviceName: string, readonly command: string) {
    super(`Device "${deviceName}" does not understand "${command}"`)
  }
}

// ============================================================================
// Fatal at init
// ============================================================================

export interface DeviceFailure {
  device: string
  error: Error
}

export class DeviceInitError extends StationError {
  readonly code = 'DEVICE_INIT_FAILED'

  constructor(readonly failures: DeviceFailure[]) {
    super(
      `Failed to initialize ${failures.length} device(s): ` +
        failures.map(f => `${f.device} (${f.error.message})`).join(', ')
    )
  }
}

export class BusConnectionError extends StationError {
  readonly code = 'BUS_CONNECTION_FAILED'

  constructor(readonly broker: string, cause: unknown) {
    super(`Failed to connect to MQTT broker ${broker}: ${errorMessage(cause)}`, { cause })
  }
}

export class DriverUnavailableError extends StationError {
  readonly code = 'DRIVER_UNAVAILABLE'

  constructor(readonly driver: string) {
    super(`No hardware driver available for ${driver}, run with --mock`)
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
