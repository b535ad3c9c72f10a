import type { Actuator } from '../../core/types/device'
import type { ShutdownSignal } from '../../core/shutdown'
import type { Logger } from '../../lib/logger'
import type { BusSubscription, Messenger, Msg, MsgHandler } from '../messenger/service'
import { DuplicateRouteError, RoutesLockedError, errorMessage } from '../../lib/errors'

export type RouteHandler = (payload: Buffer) => Promise<void>

export type RouterState = 'unsubscribed' | 'subscribed'

export interface RouteEntry {
  topic: string
  actuator: Actuator
}

export interface CommandRouterOptions {
  routes?: RouteEntry[]
  // Subscription filters; defaults to the routed topics
  filters?: string[]
  // Filters whose messages are only logged at debug, never routed
  monitor?: string[]
}

/**
 * Dispatches inbound control messages to the one actuator bound to each topic.
 * Every message is handled on its own: an unknown topic or a failing actuator is logged and the
 * router carries on.
 */
export class CommandRouter {
  private routes = new Map<string, Actuator>()
  private subscriptions: BusSubscription[] = []
  private filters: string[] | undefined
  private monitor: string[]
  private currentState: RouterState = 'unsubscribed'

  constructor(
    private messenger: Messenger,
    private shutdown: ShutdownSignal,
    private logger: Logger,
    options: CommandRouterOptions = {}
  ) {
    this.filters = options.filters
    this.monitor = options.monitor ?? []
    for (const { topic, actuator } of options.routes ?? []) {
      this.addRoute(topic, actuator)
    }
  }

  get state(): RouterState {
    return this.currentState
  }

  /**
   * Bind a topic to an actuator. Only allowed before start().
   */
  addRoute(topic: string, actuator: Actuator): void {
    if (this.currentState === 'subscribed') {
      throw new RoutesLockedError(topic)
    }
    if (this.routes.has(topic)) {
      throw new DuplicateRouteError(topic)
    }
    this.routes.set(topic, actuator)
  }

  route(topic: string): RouteHandler | undefined {
    const actuator = this.routes.get(topic)
    if (!actuator) return undefined
    return payload => actuator.handleMessage(payload)
  }

  topics(): string[] {
    return Array.from(this.routes.keys())
  }

  async start(): Promise<void> {
    if (this.currentState === 'subscribed' || this.shutdown.triggered) return
    this.currentState = 'subscribed'

    const filters = this.filters ?? this.topics()
    const routed: MsgHandler = msg => this.handleMessage(msg)
    const observed: MsgHandler = msg => {
      if (!this.shutdown.triggered) this.logInbound(msg)
    }

    const plan = [
      ...filters.map(filter => ({ filter, handler: routed })),
      ...this.monitor.map(filter => ({ filter, handler: observed })),
    ]

    for (const { filter, handler } of plan) {
      const subscription = await this.messenger.subscribe(filter, handler)
      // stop() ran while the subscribe was pending
      if (this.currentState !== 'subscribed' || this.shutdown.triggered) {
        await this.release(subscription)
        return
      }
      this.subscriptions.push(subscription)
    }

    this.logger.info({
      msg: `[ROUTER] Routing ${this.routes.size} topics`,
      filters,
      monitor: this.monitor,
      topics: this.topics(),
    })
  }

  async stop(): Promise<void> {
    if (this.currentState === 'unsubscribed') return
    this.currentState = 'unsubscribed'

    const subscriptions = this.subscriptions.splice(0, this.subscriptions.length)
    for (const subscription of subscriptions) {
      await this.release(subscription)
    }
  }

  private async release(subscription: BusSubscription): Promise<void> {
    try {
      await subscription.unsubscribe()
    } catch (err) {
      this.logger.warn({
        msg: `[ROUTER] Failed to unsubscribe ${subscription.filter}`,
        filter: subscription.filter,
        error: errorMessage(err),
      })
    }
  }

  /**
   * Handle one inbound message. Never throws.
   */
  async handleMessage(msg: Msg): Promise<void> {
    if (this.shutdown.triggered) return
    this.logInbound(msg)

    const handler = this.route(msg.topic)
    if (!handler) {
      this.logger.warn({ msg: `[ROUTER] Unknown topic ${msg.topic}`, topic: msg.topic })
      return
    }

    try {
      await handler(msg.payload)
    } catch (err) {
      this.logger.error({
        msg: `[ROUTER] Handler failed for ${msg.topic}`,
        topic: msg.topic,
        device: this.routes.get(msg.topic)?.name,
        error: errorMessage(err),
      })
    }
  }

  private logInbound(msg: Msg): void {
    this.logger.debug({
      msg: `[ROUTER] ${msg.topic}`,
      direction: 'IN',
      topic: msg.topic,
      payload: msg.payload.toString(),
    })
  }
}
