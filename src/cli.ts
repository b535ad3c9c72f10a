import { Command, Option } from 'commander'
import { LOG_FORMATS, LOG_LEVELS, LOG_OUTPUTS, parseConfig, type EnvSource, type StationConfig } from './config/env'

interface CliOptions {
  mock?: boolean
  mqttBroker?: string
  mqttUsername?: string
  mqttPassword?: string
  stationName?: string
  logLevel?: string
  logOutput?: string
  logFormat?: string
  logFile?: string
  apiPort?: string
}

export function buildProgram(): Command {
  return new Command()
    .name('garden-station')
    .description('Irrigation station controller: sensors, buttons and pump over MQTT')
    .version('1.0.0')
    .option('--mock', 'Use simulated devices instead of GPIO/I2C hardware')
    .option('--mqtt-broker <url>', 'MQTT broker address')
    .option('--mqtt-username <username>', 'MQTT username')
    .option('--mqtt-password <password>', 'MQTT password')
    .option('--station-name <name>', 'Station name')
    .addOption(new Option('--log-level <level>', 'Log level').choices(LOG_LEVELS))
    .addOption(new Option('--log-output <output>', 'Log output').choices(LOG_OUTPUTS))
    .addOption(new Option('--log-format <format>', 'Log format').choices(LOG_FORMATS))
    .option('--log-file <path>', 'Log file path (when --log-output=file)')
    .option('--api-port <port>', 'Status server port')
    .exitOverride()
}

/**
 * Merge command-line flags over the environment and validate the result.
 * Flags win; anything not given on the command line falls back to env, then to defaults.
 */
export function resolveConfig(argv: string[], env: EnvSource = process.env): StationConfig {
  const program = buildProgram()
  program.parse(argv)
  const options = program.opts<CliOptions>()

  const overrides: EnvSource = {
    STATION_NAME: options.stationName,
    MOCK: options.mock ? 'true' : undefined,
    MQTT_BROKER: options.mqttBroker,
    MQTT_USERNAME: options.mqttUsername,
    MQTT_PASSWORD: options.mqttPassword,
    LOG_LEVEL: options.logLevel,
    LOG_OUTPUT: options.logOutput,
    LOG_FORMAT: options.logFormat,
    LOG_FILE: options.logFile,
    API_PORT: options.apiPort,
  }
  const given = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined))

  return parseConfig({ ...env, ...given })
}
