/**
 * pino loggers for the conductor.
 *
 * Modules create a named logger at import time, before the CLI has read the
 * configuration; `setLogLevel` later moves all of them to the configured
 * level. Output is pino's JSON lines, or pino-pretty when LOG_PRETTY=true or
 * NODE_ENV=development.
 */

import pino from 'pino'
import type { Logger } from 'pino'

export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

type Env = Record<string, string | undefined>

const LEVEL_BY_NODE_ENV: Record<string, string> = {
  production: 'info',
  development: 'debug',
  test: 'silent',
}

const created = new Set<Logger>()

/**
 * LOG_LEVEL first, then NODE_ENV; plain CLI use gets `warn` so stdout stays
 * readable.
 */
export function resolveLogLevel(env: Env = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL
  return LEVEL_BY_NODE_ENV[env.NODE_ENV ?? ''] ?? 'warn'
}

function wantsPretty(env: Env): boolean {
  return env.LOG_PRETTY === undefined ? env.NODE_ENV === 'development' : env.LOG_PRETTY === 'true'
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const log = pino({
    name: options.name ?? name,
    level: options.level ?? resolveLogLevel(),
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: { level: (label) => ({ level: label }) },
    ...((options.pretty ?? wantsPretty(process.env))
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
          },
        }
      : {}),
  })
  created.add(log)
  return log
}

/** Move every logger created so far to `level`, unless LOG_LEVEL pins one */
export function setLogLevel(level: string): void {
  const effective = process.env.LOG_LEVEL || level
  created.forEach((log) => {
    log.level = effective
  })
}

export const logger = createLogger('conductor')
