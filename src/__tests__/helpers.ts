/**
 * Shared test doubles: an in-process messenger and a logger that captures entries.
 */
import pino from 'pino'
import { customLevels, type Logger } from '../lib/logger'
import { NotConnectedError } from '../lib/errors'
import { parseConfig, type StationConfig } from '../config/env'
import {
  createMsg,
  matchesTopic,
  type BusSubscription,
  type Messenger,
  type MsgHandler,
} from '../modules/messenger/service'

// ============================================================================
// Logger
// ============================================================================

export interface LogEntry {
  level: number
  msg: string
  [key: string]: unknown
}

export function createTestLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = pino(
    { level: 'trace', customLevels, base: null },
    {
      write(line: string) {
        entries.push(JSON.parse(line))
      },
    }
  )
  return { logger, entries }
}

// ============================================================================
// Messenger
// ============================================================================

export interface Published {
  topic: string
  payload: string
}

export class MemoryMessenger implements Messenger {
  published: Published[] = []
  subscriptions: { filter: string; handler: MsgHandler }[] = []
  connectError: Error | null = null
  publishError: Error | null = null
  requireConnection = false
  closed = false
  // While set, subscribe() waits for it before registering
  subscribeGate: Promise<void> | null = null
  private isConnected = false

  get connected(): boolean {
    return this.isConnected
  }

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError
    this.isConnected = true
  }

  async publish(topic: string, payload: string | Buffer): Promise<void> {
    if (this.requireConnection && !this.isConnected) throw new NotConnectedError()
    if (this.publishError) throw this.publishError
    this.published.push({ topic, payload: payload.toString() })
  }

  async subscribe(filter: string, handler: MsgHandler): Promise<BusSubscription> {
    if (this.subscribeGate) await this.subscribeGate
    const entry = { filter, handler }
    this.subscriptions.push(entry)
    return {
      filter,
      unsubscribe: async () => {
        this.subscriptions = this.subscriptions.filter(s => s !== entry)
      },
    }
  }

  async close(): Promise<void> {
    this.isConnected = false
    this.closed = true
  }

  /**
   * Simulate a message arriving from the broker
   */
  async deliver(topic: string, payload: string | Buffer): Promise<void> {
    const msg = createMsg(topic, payload)
    const matching = this.subscriptions.filter(s => matchesTopic(s.filter, topic))
    await Promise.all(matching.map(s => s.handler(msg)))
  }

  topics(): string[] {
    return this.published.map(p => p.topic)
  }
}

// ============================================================================
// Config
// ============================================================================

export function testConfig(env: Record<string, string> = {}): StationConfig {
  return parseConfig({ MQTT_CLIENT_ID: 'test-station', LOG_LEVEL: 'silent', ...env })
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {}
  const promise = new Promise<void>(r => {
    resolve = r
  })
  return { promise, resolve }
}

/**
 * Let pending promise callbacks run
 */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 5; i++) {
    await Promise.resolve()
  }
}
