import mqtt, { type IClientOptions, type MqttClient } from 'mqtt'
import type { Logger } from '../../lib/logger'
import { NotConnectedError, errorMessage } from '../../lib/errors'
import {
  createMsg,
  matchesTopic,
  type BusSubscription,
  type Messenger,
  type Msg,
  type MsgHandler,
} from './service'

export interface MqttMessengerOptions {
  broker: string
  clientId: string
  username?: string
  password?: string
  connectTimeout: number
  reconnectPeriod: number
  qos?: 0 | 1 | 2
}

interface HandlerEntry {
  filter: string
  handler: MsgHandler
}

/**
 * Messenger backed by the mqtt client. The client serializes concurrent publishes and
 * resubscribes after a reconnect; this class adds wildcard dispatch and per-handler isolation.
 */
export class MqttMessenger implements Messenger {
  private client: MqttClient | null = null
  // A connect() still waiting for the broker
  private pending: { promise: Promise<void>; abort: (err: Error) => void } | null = null
  private handlers: HandlerEntry[] = []
  private readonly qos: 0 | 1 | 2

  constructor(
    private options: MqttMessengerOptions,
    private logger: Logger
  ) {
    this.qos = options.qos ?? 0
  }

  get connected(): boolean {
    return this.client !== null && this.client.connected
  }

  /**
   * Open the broker connection. Rejects if the first connection attempt fails or times out;
   * later drops are handled by the client's own reconnect loop.
   */
  connect(): Promise<void> {
    if (this.client) {
      return Promise.resolve()
    }
    if (this.pending) {
      return this.pending.promise
    }

    const { broker, clientId, username, password, connectTimeout, reconnectPeriod } = this.options
    const clientOptions: IClientOptions = {
      clientId,
      username: username || undefined,
      password: password || undefined,
      connectTimeout,
      reconnectPeriod,
    }

    this.logger.info({ msg: `[MQTT] Connecting to ${broker}`, broker, clientId })

    let settled = false
    let abort: (err: Error) => void = () => {}
    const promise = new Promise<void>((resolve, reject) => {
      const client = mqtt.connect(broker, clientOptions)

      const fail = (err: Error) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        this.pending = null
        client.end(true)
        reject(err)
      }
      abort = fail

      const timer = setTimeout(
        () => fail(new Error(`connection timed out after ${connectTimeout}ms`)),
        connectTimeout
      )

      client.on('connect', () => {
        // Aborted by close() before the broker answered
        if (settled && this.client !== client) {
          client.end(true)
          return
        }
        if (!settled) {
          settled = true
          clearTimeout(timer)
          this.pending = null
          this.client = client
          this.logger.success({ msg: `✓ [MQTT] Connected to broker`, broker })
          resolve()
          return
        }
        this.logger.info({ msg: '[MQTT] Reconnected to broker', broker })
      })

      client.on('error', err => {
        if (!settled) {
          fail(err)
          return
        }
        this.logger.error({ msg: '[MQTT] Connection error', error: err.message, broker })
      })

      client.on('offline', () => {
        if (settled) {
          this.logger.warn({ msg: '[MQTT] Broker offline', broker })
        }
      })

      client.on('message', (topic, payload) => {
        this.dispatch(createMsg(topic, payload))
      })
    })
    if (!settled) {
      this.pending = { promise, abort }
    }
    return promise
  }

  async publish(topic: string, payload: string | Buffer): Promise<void> {
    const client = this.client
    if (!client || !client.connected) {
      throw new NotConnectedError()
    }
    await client.publishAsync(topic, payload, { qos: this.qos })
    this.logger.debug({ msg: `[MQTT] ${topic}`, direction: 'OUT', topic, payload: payload.toString() })
  }

  async subscribe(filter: string, handler: MsgHandler): Promise<BusSubscription> {
    const client = this.client
    if (!client || !client.connected) {
      throw new NotConnectedError()
    }

    const alreadySubscribed = this.handlers.some(h => h.filter === filter)
    const entry: HandlerEntry = { filter, handler }
    this.handlers.push(entry)

    if (!alreadySubscribed) {
      try {
        await client.subscribeAsync(filter, { qos: this.qos })
      } catch (err) {
        this.handlers = this.handlers.filter(h => h !== entry)
        throw err
      }
      this.logger.info({ msg: `[MQTT] Subscribed to ${filter}`, filter })
    }

    let active = true
    return {
      filter,
      unsubscribe: async () => {
        if (!active) return
        active = false
        this.handlers = this.handlers.filter(h => h !== entry)
        if (this.handlers.some(h => h.filter === filter)) return
        if (this.client?.connected) {
          await this.client.unsubscribeAsync(filter)
          this.logger.info({ msg: `[MQTT] Unsubscribed from ${filter}`, filter })
        }
      },
    }
  }

  async close(): Promise<void> {
    this.pending?.abort(new Error('Connection closed before the broker answered'))

    const client = this.client
    this.client = null
    this.handlers = []
    if (client) {
      await client.endAsync()
      this.logger.info({ msg: '[MQTT] Connection closed', broker: this.options.broker })
    }
  }

  /**
   * Deliver a message to every matching handler. Each handler runs independently:
   * a throw or rejection is logged and does not reach the client or other handlers.
   */
  private dispatch(msg: Msg): void {
    for (const entry of this.handlers) {
      if (!matchesTopic(entry.filter, msg.topic)) continue
      void this.invoke(entry, msg)
    }
  }

  private async invoke(entry: HandlerEntry, msg: Msg): Promise<void> {
    try {
      await entry.handler(msg)
    } catch (err) {
      this.logger.error({
        msg: `[MQTT] Handler failed for ${msg.topic}`,
        topic: msg.topic,
        filter: entry.filter,
        error: errorMessage(err),
      })
    }
  }
}
