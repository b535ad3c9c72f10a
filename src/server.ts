#!/usr/bin/env node
import { CommanderError } from 'commander'
import { buildApp } from './app'
import { resolveConfig } from './cli'
import type { StationConfig } from './config/env'
import { createLogger } from './lib/logger'
import { errorMessage } from './lib/errors'
import { MqttMessenger } from './modules/messenger/mqttMessenger'
import { createDeviceFactory } from './modules/drivers'
import { Station } from './modules/station/station'

async function start() {
  let config: StationConfig
  try {
    config = resolveConfig(process.argv)
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exit(err.exitCode)
    }
    console.error(`Invalid configuration: ${errorMessage(err)}`)
    process.exit(2)
  }

  const logger = createLogger(config.log)
  logger.info({
    msg: `[SYSTEM] Starting garden-station`,
    station: config.station.name,
    mock: config.station.mock,
    broker: config.mqtt.broker,
    logLevel: config.log.level,
    logOutput: config.log.output,
  })

  const messenger = new MqttMessenger(config.mqtt, logger)
  const station = new Station({
    config,
    logger,
    messenger,
    drivers: createDeviceFactory(config.station.mock),
  })
  const app = await buildApp({ station, logger })

  const exit = (code: number) => {
    logger.flush(() => process.exit(code))
  }

  // Stop exactly once, whichever signal arrives first
  let stopping = false
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) return
    stopping = true
    logger.info({ msg: `[SYSTEM] Received ${signal}, stopping station`, signal })
    void station.stop()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    await station.init()
    await app.listen({ port: config.api.port, host: config.api.host })
    app.log.success({
      msg: `✓ [HTTP] Status server listening on ${config.api.host}:${config.api.port}`,
      url: `http://localhost:${config.api.port}`,
    })
    await station.start()
  } catch (err) {
    logger.fatal({ msg: `[SYSTEM] Startup aborted: ${errorMessage(err)}` })
    await station.stop()
    await app.close()
    exit(1)
    return
  }

  await station.done
  await app.close()
  logger.info({ msg: '[SYSTEM] garden-station stopped' })
  exit(0)
}

start().catch(err => {
  console.error('Fatal error:', err)
  process.exit(1)
})
