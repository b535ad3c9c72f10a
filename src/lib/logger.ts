import pino, { type DestinationStream } from 'pino'
import pretty from 'pino-pretty'
import tty from 'tty'
import type { LogFormat, LogLevel, LogOutput } from '../config/env'

// `success` sits between debug and info, same as the HTTP layer expects
export const customLevels = {
  success: 25,
} as const

export type Logger = pino.Logger<keyof typeof customLevels>

export interface LoggerOptions {
  level: LogLevel
  output: LogOutput
  format: LogFormat
  file: string
}

function fileDescriptor(output: LogOutput): number {
  return output === 'stderr' ? 2 : 1
}

/**
 * Colour only when the chosen stream is a terminal
 */
export function shouldColorize(output: LogOutput): boolean {
  return output !== 'file' && tty.isatty(fileDescriptor(output))
}

/**
 * Build the destination stream for the configured output and format.
 * Text goes through pino-pretty, JSON is written as-is.
 */
export function createDestination(options: LoggerOptions): DestinationStream {
  const toFile = options.output === 'file'

  if (options.format === 'text') {
    return pretty({
      destination: toFile ? options.file : fileDescriptor(options.output),
      colorize: shouldColorize(options.output),
      mkdir: toFile,
      customLevels: 'success:25',
      ignore: 'pid,hostname',
      translateTime: 'SYS:standard',
    })
  }

  return pino.destination({
    dest: toFile ? options.file : fileDescriptor(options.output),
    mkdir: toFile,
    sync: false,
  })
}

export function createLogger(options: LoggerOptions, destination?: DestinationStream): Logger {
  return pino(
    {
      level: options.level,
      customLevels,
      base: null,
    },
    destination ?? createDestination(options)
  )
}
