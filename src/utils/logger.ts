/**
 * Logger utility for xsoar-packs
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // Plain CLI use: keep stderr quiet unless something goes wrong
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  return process.env.NODE_ENV === 'development'
}

const registry = new Set<pino.Logger>()
let levelOverride: string | undefined

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? levelOverride ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()
  const logger = buildLogger(name, level, pretty, options.name)
  if (options.level === undefined) registry.add(logger)
  return logger
}

/**
 * Change the level of every logger created without an explicit level,
 * including ones created later. LOG_LEVEL, when set, still wins.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  levelOverride = level
  for (const logger of registry) {
    logger.level = level
  }
}

function buildLogger(
  name: string,
  level: string,
  pretty: boolean,
  displayName: string | undefined
): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    name: displayName ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  if (pretty) {
    // pino-pretty is a devDependency; only used outside production
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  }

  // stdout carries command output, so logs go to stderr
  return pino(baseOptions, pino.destination(2))
}

/** Root application logger */
export const logger = createLogger('xsoar-packs')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
