import { DeviceRegistry } from '../../core/registry'
import { ShutdownSignal } from '../../core/shutdown'
import {
  isSimulated,
  type Actuator,
  type DeviceFactory,
  type DeviceKind,
  type Display,
  type EnvironmentReading,
  type InputDevice,
  type Sensor,
} from '../../core/types/device'
import { hardware, type StationConfig } from '../../config/env'
import type { Logger } from '../../lib/logger'
import {
  BusConnectionError,
  DeviceInitError,
  StationStateError,
  errorMessage,
  toError,
  type DeviceFailure,
} from '../../lib/errors'
import { CONTROL_WILDCARD, DATA_WILDCARD, TOPICS, type Messenger } from '../messenger/service'
import { SensorPoller, type PollingJobInfo } from '../poller/sensorPoller'
import { encodeDecimal, encodeEnvironment } from '../poller/service'
import { EventDispatcher } from '../dispatcher/eventDispatcher'
import { CommandRouter } from '../router/commandRouter'
import { SimulationDriver } from '../simulation/simulationDriver'

export type StationState = 'created' | 'initialized' | 'running' | 'stopped'

export interface StationOptions {
  config: StationConfig
  logger: Logger
  messenger: Messenger
  drivers: DeviceFactory
  shutdown?: ShutdownSignal
}

export interface StationDevices {
  on?: InputDevice
  off?: InputDevice
  pump?: Actuator
  env?: Sensor<EnvironmentReading>
  display?: Display
  soil?: Sensor<number>
}

export interface StationStatus {
  name: string
  mock: boolean
  state: StationState
  startedAt: Date | null
  connected: boolean
  devices: { name: string; kind: DeviceKind }[]
  polling: PollingJobInfo[]
  routes: string[]
}

/**
 * Lifecycle coordinator for the irrigation station.
 *
 * Owns the device registry and every activity (pollers, edge dispatch, command routing,
 * simulation). Collaborators are injected; nothing here reaches for a global.
 */
export class Station {
  readonly registry = new DeviceRegistry()
  readonly shutdown: ShutdownSignal
  readonly done: Promise<void>

  private readonly config: StationConfig
  private readonly logger: Logger
  private readonly messenger: Messenger
  private readonly drivers: DeviceFactory

  private readonly poller: SensorPoller
  private readonly dispatcher: EventDispatcher
  private readonly router: CommandRouter
  private readonly simulation: SimulationDriver

  private on?: InputDevice
  private off?: InputDevice
  private pump?: Actuator
  private env?: Sensor<EnvironmentReading>
  private display?: Display
  private soil?: Sensor<number>

  private currentState: StationState = 'created'
  private startedAt: Date | null = null
  private stopRequested = false
  private resolveDone: () => void = () => {}

  constructor(options: StationOptions) {
    this.config = options.config
    this.logger = options.logger
    this.messenger = options.messenger
    this.drivers = options.drivers
    this.shutdown = options.shutdown ?? new ShutdownSignal()
    this.done = new Promise<void>(resolve => {
      this.resolveDone = resolve
    })

    this.poller = new SensorPoller(this.messenger, this.shutdown, this.logger)
    this.dispatcher = new EventDispatcher(this.messenger, this.shutdown, this.logger)
    this.simulation = new SimulationDriver(this.shutdown, this.logger)
    this.router = new CommandRouter(this.messenger, this.shutdown, this.logger, {
      filters: [CONTROL_WILDCARD],
      // Echoes of the station's own readings and button events
      monitor: [DATA_WILDCARD],
    })

    // A signal fired elsewhere (e.g. a shared one) still tears the station down
    this.shutdown.onTrigger(() => {
      void this.stop()
    })
  }

  get state(): StationState {
    return this.currentState
  }

  get devices(): StationDevices {
    return {
      on: this.on,
      off: this.off,
      pump: this.pump,
      env: this.env,
      display: this.display,
      soil: this.soil,
    }
  }

  // ==========================================================================
  // Init
  // ==========================================================================

  /**
   * Bring up every device group in order: inputs, actuators, environment sensor, display,
   * soil sensor. Each group starts its activity as soon as its device is up. Any failure aborts
   * the whole init once all groups have been attempted.
   */
  async init(): Promise<void> {
    if (this.currentState !== 'created') {
      throw new StationStateError('init', this.currentState)
    }

    const { pins, env, display } = hardware
    const failures: DeviceFailure[] = []

    const bringUp = async <D>(
      device: string,
      create: () => Promise<D>,
      wire: (instance: D) => void | Promise<void>
    ): Promise<void> => {
      try {
        const instance = await create()
        await wire(instance)
      } catch (err) {
        const error = toError(err)
        failures.push({ device, error })
        this.logger.error({ msg: `[STATION] Failed to initialize ${device}`, device, error: error.message })
      }
    }

    // Inputs
    await bringUp('on', () => this.drivers.button('on', pins.on), button => {
      this.registry.add(button)
      this.dispatcher.register(button)
      this.on = button
    })
    await bringUp('off', () => this.drivers.button('off', pins.off), button => {
      this.registry.add(button)
      this.dispatcher.register(button)
      this.off = button
    })

    // Actuators
    await bringUp('pump', () => this.drivers.relay('pump', pins.pump), relay => {
      this.registry.add(relay)
      this.router.addRoute(TOPICS.pump, relay)
      this.pump = relay
    })

    // Environment
    await bringUp('env', () => this.drivers.environment('env', env.bus, env.address), sensor => {
      this.registry.add(sensor)
      this.poller.startPolling(sensor, this.config.polling.envIntervalMs, encodeEnvironment, TOPICS.env)
      this.env = sensor
    })

    // Display
    await bringUp('display', () => this.drivers.display('display', display.address, display.bus), async lcd => {
      await lcd.clear()
      this.registry.add(lcd)
      this.router.addRoute(TOPICS.lcd, lcd)
      this.display = lcd
    })

    // Soil
    await bringUp('soil', () => this.drivers.soil('soil', pins.soil), sensor => {
      this.registry.add(sensor)
      this.poller.startPolling(sensor, this.config.polling.soilIntervalMs, encodeDecimal, TOPICS.soil)
      this.soil = sensor
      if (this.config.station.mock) {
        this.startSimulation(sensor)
      }
    })

    if (failures.length > 0) {
      const error = new DeviceInitError(failures)
      this.logger.fatal({ msg: `[STATION] ${error.message}`, failures: failures.map(f => f.device) })
      await this.stop()
      throw error
    }

    this.currentState = 'initialized'
    this.logger.success({
      msg: `✓ [STATION] ${this.config.station.name} initialized with ${this.registry.size} devices`,
      station: this.config.station.name,
      mock: this.config.station.mock,
      devices: this.registry.list().map(d => d.name),
    })
  }

  private startSimulation(sensor: Sensor<number>): void {
    if (!isSimulated(sensor)) {
      this.logger.warn({ msg: `[STATION] ${sensor.name} has no synthetic signal, not simulating`, device: sensor.name })
      return
    }
    const { intervalMs, delta } = this.config.simulation
    this.simulation.startSimulation(sensor, intervalMs, delta)
  }

  // ==========================================================================
  // Start / Stop
  // ==========================================================================

  /**
   * Connect to the broker, then subscribe the command router. A failed connection is fatal.
   */
  async start(): Promise<void> {
    if (this.currentState !== 'initialized') {
      throw new StationStateError('start', this.currentState)
    }

    try {
      await this.messenger.connect()
    } catch (err) {
      // close() from a concurrent stop() aborts the pending connect
      if (this.stopRequested) return
      const error = new BusConnectionError(this.config.mqtt.broker, err)
      this.logger.fatal({ msg: `[STATION] ${error.message}`, broker: this.config.mqtt.broker })
      throw error
    }

    // stop() may have run while the connection was pending
    if (this.stopRequested) return

    await this.router.start()
    if (this.stopRequested) return

    this.currentState = 'running'
    this.startedAt = new Date()
    this.logger.success({
      msg: `✓ [STATION] ${this.config.station.name} running`,
      station: this.config.station.name,
      routes: this.router.topics(),
    })
  }

  /**
   * Broadcast the shutdown signal once, then release the router subscriptions and the broker
   * connection. Every call returns the same promise.
   */
  stop(): Promise<void> {
    if (this.stopRequested) return this.done
    this.stopRequested = true

    const previous = this.currentState
    this.currentState = 'stopped'
    // Pollers, dispatcher subscriptions and simulations observe this synchronously
    this.shutdown.trigger('stop')
    this.logger.info({ msg: `[STATION] Stopping ${this.config.station.name}`, from: previous })

    void this.release()
    return this.done
  }

  private async release(): Promise<void> {
    await this.router.stop()
    try {
      await this.messenger.close()
    } catch (err) {
      this.logger.error({ msg: '[STATION] Failed to close messenger', error: errorMessage(err) })
    }
    this.logger.info({ msg: `[STATION] ${this.config.station.name} stopped` })
    this.resolveDone()
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  status(): StationStatus {
    return {
      name: this.config.station.name,
      mock: this.config.station.mock,
      state: this.currentState,
      startedAt: this.startedAt,
      connected: this.messenger.connected,
      devices: this.registry.list().map(d => ({ name: d.name, kind: d.kind })),
      polling: this.poller.list(),
      routes: this.router.topics(),
    }
  }
}
