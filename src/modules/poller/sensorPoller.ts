import type { Sensor } from '../../core/types/device'
import type { ShutdownSignal } from '../../core/shutdown'
import type { Logger } from '../../lib/logger'
import type { Messenger } from '../messenger/service'
import { dataTopic } from '../messenger/service'
import { DuplicatePollingError, StationStateError, errorMessage } from '../../lib/errors'
import type { Encoder } from './service'

export interface PollingHandle {
  readonly device: string
  readonly topic: string
  readonly intervalMs: number
  stop(): void
}

export interface PollingJobInfo {
  device: string
  topic: string
  intervalMs: number
  cycles: number
  failures: number
  lastPublishedAt: Date | null
}

interface PollingJob<T> {
  sensor: Sensor<T>
  topic: string
  intervalMs: number
  encode(reading: T): string | Buffer
  timer: NodeJS.Timeout | null
  inFlight: boolean
  stopped: boolean
  cycles: number
  failures: number
  lastPublishedAt: Date | null
}

/**
 * One periodic read-and-publish schedule per sensor.
 *
 * Cycles never overlap for a device: a tick that fires while the previous read is still pending
 * is dropped. Read, encode and publish failures are logged and the schedule keeps going.
 */
export class SensorPoller {
  private jobs = new Map<string, PollingJob<unknown>>()

  constructor(
    private messenger: Messenger,
    private shutdown: ShutdownSignal,
    private logger: Logger
  ) {
    shutdown.onTrigger(() => this.stopAll())
  }

  startPolling<T>(
    sensor: Sensor<T>,
    intervalMs: number,
    encode: Encoder<T>,
    topic: string = dataTopic(sensor.name)
  ): PollingHandle {
    if (this.shutdown.triggered) {
      throw new StationStateError('start polling on', 'stopped')
    }
    if (this.jobs.has(sensor.name)) {
      throw new DuplicatePollingError(sensor.name)
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Polling interval must be positive, got ${intervalMs}`)
    }

    const job: PollingJob<T> = {
      sensor,
      topic,
      intervalMs,
      encode,
      timer: null,
      inFlight: false,
      stopped: false,
      cycles: 0,
      failures: 0,
      lastPublishedAt: null,
    }
    job.timer = setInterval(() => this.tick(job), intervalMs)
    this.jobs.set(sensor.name, job)

    this.logger.info({
      msg: `[POLLER] Polling ${sensor.name} every ${intervalMs}ms`,
      device: sensor.name,
      topic,
      intervalMs,
    })

    return {
      device: sensor.name,
      topic,
      intervalMs,
      stop: () => this.stopPolling(sensor.name),
    }
  }

  /**
   * After this returns no new read starts for the device. A read already pending may finish,
   * but its result is discarded.
   */
  stopPolling(name: string): boolean {
    const job = this.jobs.get(name)
    if (!job) return false

    job.stopped = true
    if (job.timer) {
      clearInterval(job.timer)
      job.timer = null
    }
    this.jobs.delete(name)
    this.logger.debug({ msg: `[POLLER] Stopped polling ${name}`, device: name })
    return true
  }

  stopAll(): void {
    for (const name of Array.from(this.jobs.keys())) {
      this.stopPolling(name)
    }
  }

  isPolling(name: string): boolean {
    return this.jobs.has(name)
  }

  list(): PollingJobInfo[] {
    return Array.from(this.jobs.values()).map(job => ({
      device: job.sensor.name,
      topic: job.topic,
      intervalMs: job.intervalMs,
      cycles: job.cycles,
      failures: job.failures,
      lastPublishedAt: job.lastPublishedAt,
    }))
  }

  private tick<T>(job: PollingJob<T>): void {
    if (job.stopped || this.shutdown.triggered) return
    if (job.inFlight) {
      this.logger.debug({
        msg: `[POLLER] Skipping tick for ${job.sensor.name}, previous cycle still running`,
        device: job.sensor.name,
      })
      return
    }

    job.inFlight = true
    void this.runCycle(job).finally(() => {
      job.inFlight = false
    })
  }

  private async runCycle<T>(job: PollingJob<T>): Promise<void> {
    const device = job.sensor.name
    job.cycles++

    let reading: T
    try {
      reading = await job.sensor.get()
    } catch (err) {
      job.failures++
      this.logger.error({ msg: `[POLLER] ${device} read failed`, device, error: errorMessage(err) })
      return
    }

    if (job.stopped || this.shutdown.triggered) return

    let payload: string | Buffer
    try {
      payload = job.encode(reading)
    } catch (err) {
      job.failures++
      this.logger.error({ msg: `[POLLER] ${device} encode failed`, device, error: errorMessage(err) })
      return
    }

    try {
      await this.messenger.publish(job.topic, payload)
      job.lastPublishedAt = new Date()
      this.logger.info({
        msg: `[POLLER] ${device} reading published`,
        device,
        topic: job.topic,
        value: payload.toString(),
      })
    } catch (err) {
      job.failures++
      this.logger.error({
        msg: `[POLLER] ${device} publish failed`,
        device,
        topic: job.topic,
        error: errorMessage(err),
      })
    }
  }
}
