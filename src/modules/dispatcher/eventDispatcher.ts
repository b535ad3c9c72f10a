import type { EdgeEvent, EdgeType, InputDevice, Subscription } from '../../core/types/device'
import type { ShutdownSignal } from '../../core/shutdown'
import type { Logger } from '../../lib/logger'
import { dataTopic, type Messenger } from '../messenger/service'
import { DuplicateSubscriptionError, StationStateError, errorMessage } from '../../lib/errors'

export interface EdgeBinding {
  topic: string
  payload: string
}

export type EdgeBindings = Partial<Record<EdgeType, EdgeBinding>>

/**
 * Rising edge of input "on" publishes "on" to d/on
 */
export function defaultBindings(name: string): EdgeBindings {
  return {
    rising: { topic: dataTopic(name), payload: name },
  }
}

/**
 * Turns input edges into outbound messages, one message per edge.
 *
 * Handlers run on the driver's notification path, so they only format and hand the message to
 * the messenger without waiting for it.
 */
export class EventDispatcher {
  private subscriptions = new Map<string, Subscription>()

  constructor(
    private messenger: Messenger,
    private shutdown: ShutdownSignal,
    private logger: Logger
  ) {
    shutdown.onTrigger(() => this.unregisterAll())
  }

  register(input: InputDevice, bindings: EdgeBindings = defaultBindings(input.name)): Subscription {
    if (this.shutdown.triggered) {
      throw new StationStateError('register edges on', 'stopped')
    }
    if (this.subscriptions.has(input.name)) {
      throw new DuplicateSubscriptionError(input.name)
    }

    const driverSubscription = input.registerEdgeHandler(event => this.handleEdge(input.name, event, bindings))
    const subscription: Subscription = {
      unsubscribe: () => this.unregister(input.name),
    }
    this.subscriptions.set(input.name, driverSubscription)

    this.logger.info({
      msg: `[DISPATCH] Listening for edges on ${input.name}`,
      device: input.name,
      edges: Object.keys(bindings),
    })
    return subscription
  }

  unregister(name: string): boolean {
    const subscription = this.subscriptions.get(name)
    if (!subscription) return false
    this.subscriptions.delete(name)
    subscription.unsubscribe()
    return true
  }

  unregisterAll(): void {
    for (const name of Array.from(this.subscriptions.keys())) {
      this.unregister(name)
    }
  }

  isRegistered(name: string): boolean {
    return this.subscriptions.has(name)
  }

  private handleEdge(device: string, event: EdgeEvent, bindings: EdgeBindings): void {
    if (this.shutdown.triggered || !this.subscriptions.has(device)) return

    const binding = bindings[event.type]
    if (!binding) {
      this.logger.debug({ msg: `[DISPATCH] Ignoring ${event.type} edge on ${device}`, device, edge: event.type })
      return
    }

    this.logger.info({
      msg: `[DISPATCH] ${device} ${event.type} edge`,
      device,
      edge: event.type,
      topic: binding.topic,
    })

    this.messenger.publish(binding.topic, binding.payload).catch(err => {
      this.logger.error({
        msg: `[DISPATCH] Publish failed for ${device}`,
        device,
        topic: binding.topic,
        error: errorMessage(err),
      })
    })
  }
}
