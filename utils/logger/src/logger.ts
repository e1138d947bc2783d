import type { Logger as PinoLogger } from 'pino'

import pino                            from 'pino'

export type LogAttributes = Record<string, unknown>

let root: PinoLogger | undefined

const getRootLogger = (): PinoLogger => {
  if (!root) {
    root = pino({
      level: 'info',
      formatters: {
        level: (label) => ({ level: label }),
      },
    })
  }

  return root
}

export const setLogLevel = (level: string): void => {
  getRootLogger().level = level.trim().toLowerCase()
}

export const getLogLevel = (): string => getRootLogger().level

export class Logger {
  private instance?: PinoLogger

  constructor(private readonly scope: string) {}

  // created on first write, after setLogLevel
  private get logger(): PinoLogger {
    this.instance ??= getRootLogger().child({ scope: this.scope })

    return this.instance
  }

  debug(message: string, attributes: LogAttributes = {}): void {
    this.logger.debug(attributes, message)
  }

  info(message: string, attributes: LogAttributes = {}): void {
    this.logger.info(attributes, message)
  }

  warn(message: string, attributes: LogAttributes = {}): void {
    this.logger.warn(attributes, message)
  }

  error(message: string, attributes: LogAttributes = {}): void {
    this.logger.error(attributes, message)
  }
}
