/**
 * Messenger Service - topic conventions and pure helpers
 *
 * No dependency on the MQTT client, so the routing rules can be tested on their own.
 */

// ============================================================================
// Types
// ============================================================================

export interface Msg {
  readonly topic: string
  readonly payload: Buffer
  readonly time: Date
}

export type MsgHandler = (msg: Msg) => void | Promise<void>

export interface BusSubscription {
  readonly filter: string
  unsubscribe(): Promise<void>
}

/**
 * Publish/subscribe collaborator. Safe to call from every activity concurrently.
 */
export interface Messenger {
  readonly connected: boolean
  connect(): Promise<void>
  publish(topic: string, payload: string | Buffer): Promise<void>
  subscribe(filter: string, handler: MsgHandler): Promise<BusSubscription>
  close(): Promise<void>
}

// ============================================================================
// Topics
// ============================================================================

export const DATA_PREFIX = 'd'
export const CONTROL_PREFIX = 'c'
export const CONTROL_WILDCARD = `${CONTROL_PREFIX}/#`
export const DATA_WILDCARD = `${DATA_PREFIX}/#`

/**
 * Outbound topic for a device: d/<name>
 */
export function dataTopic(name: string): string {
  return `${DATA_PREFIX}/${name}`
}

/**
 * Inbound command topic: c/<name>
 */
export function controlTopic(name: string): string {
  return `${CONTROL_PREFIX}/${name}`
}

export const TOPICS = {
  soil: dataTopic('soil'),
  env: dataTopic('env'),
  on: dataTopic('on'),
  off: dataTopic('off'),
  pump: controlTopic('pump'),
  lcd: controlTopic('lcd'),
} as const

/**
 * MQTT filter matching: `+` matches one level, `#` matches the remaining levels
 * (including none) and must be last.
 */
export function matchesTopic(filter: string, topic: string): boolean {
  const filterLevels = filter.split('/')
  const topicLevels = topic.split('/')

  for (let i = 0; i < filterLevels.length; i++) {
    const level = filterLevels[i]
    if (level === '#') {
      return i === filterLevels.length - 1
    }
    if (i >= topicLevels.length) {
      return false
    }
    if (level !== '+' && level !== topicLevels[i]) {
      return false
    }
  }

  return filterLevels.length === topicLevels.length
}

export function createMsg(topic: string, payload: string | Buffer, time: Date = new Date()): Msg {
  return Object.freeze({
    topic,
    payload: typeof payload === 'string' ? Buffer.from(payload) : payload,
    time,
  })
}
