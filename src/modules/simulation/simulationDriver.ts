import type { SimulatedSensor } from '../../core/types/device'
import type { ShutdownSignal } from '../../core/shutdown'
import type { Logger } from '../../lib/logger'
import { DuplicateSimulationError, StationStateError, errorMessage } from '../../lib/errors'

export interface SimulationHandle {
  readonly device: string
  readonly intervalMs: number
  readonly delta: number
  readonly ticks: number
  stop(): void
}

interface Simulation {
  sensor: SimulatedSensor
  intervalMs: number
  delta: number
  timer: NodeJS.Timeout | null
  busy: boolean
  ticks: number
}

/**
 * Mock mode: drifts a sensor's synthetic signal by a fixed delta on every tick, so the poller
 * sees changing data without hardware.
 */
export class SimulationDriver {
  private simulations = new Map<string, Simulation>()

  constructor(
    private shutdown: ShutdownSignal,
    private logger: Logger
  ) {
    shutdown.onTrigger(() => this.stopAll())
  }

  startSimulation(sensor: SimulatedSensor, intervalMs: number, delta: number): SimulationHandle {
    if (this.shutdown.triggered) {
      throw new StationStateError('start simulation on', 'stopped')
    }
    if (this.simulations.has(sensor.name)) {
      throw new DuplicateSimulationError(sensor.name)
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Simulation interval must be positive, got ${intervalMs}`)
    }

    const simulation: Simulation = { sensor, intervalMs, delta, timer: null, busy: false, ticks: 0 }
    simulation.timer = setInterval(() => this.tick(simulation), intervalMs)
    this.simulations.set(sensor.name, simulation)

    this.logger.info({
      msg: `[SIM] Simulating ${sensor.name} (${delta} every ${intervalMs}ms)`,
      device: sensor.name,
      intervalMs,
      delta,
    })

    return {
      device: sensor.name,
      intervalMs,
      delta,
      get ticks() {
        return simulation.ticks
      },
      stop: () => this.stopSimulation(sensor.name),
    }
  }

  stopSimulation(name: string): boolean {
    const simulation = this.simulations.get(name)
    if (!simulation) return false
    if (simulation.timer) {
      clearInterval(simulation.timer)
      simulation.timer = null
    }
    this.simulations.delete(name)
    this.logger.debug({ msg: `[SIM] Stopped simulating ${name}`, device: name, ticks: simulation.ticks })
    return true
  }

  stopAll(): void {
    for (const name of Array.from(this.simulations.keys())) {
      this.stopSimulation(name)
    }
  }

  isRunning(name: string): boolean {
    return this.simulations.has(name)
  }

  private tick(simulation: Simulation): void {
    if (simulation.timer === null || simulation.busy || this.shutdown.triggered) return
    simulation.busy = true
    void this.step(simulation).finally(() => {
      simulation.busy = false
    })
  }

  private async step(simulation: Simulation): Promise<void> {
    const { sensor, delta } = simulation
    try {
      const value = await sensor.signal.get()
      if (simulation.timer === null || this.shutdown.triggered) return
      await sensor.signal.set(value + delta)
      simulation.ticks++
      this.logger.debug({ msg: `[SIM] ${sensor.name} -> ${value + delta}`, device: sensor.name, value: value + delta })
    } catch (err) {
      this.logger.error({ msg: `[SIM] ${sensor.name} update failed`, device: sensor.name, error: errorMessage(err) })
    }
  }
}
