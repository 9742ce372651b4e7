/**
 * Logger
 *
 * Pino logger factory. Emits JSON to stdout; pretty-printing, if wanted, is
 * done by piping through pino-pretty. Output is disabled under test tooling.
 */

import pino from 'pino'
import type { Logger } from 'pino'
import { loadLoggingConfig, type LoggingConfig } from './config'

export type { Logger } from 'pino'

export function makeLogger(
  bindings: Record<string, unknown> = {},
  config: LoggingConfig = loadLoggingConfig(process.env)
): Logger {
  return pino({
    level: config.level,
    enabled: config.enabled,
    base: { ...bindings, service: config.serviceName },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

/** Pino with enabled:false, for tests and callers that want silence */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false })
}
