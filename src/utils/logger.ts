/**
 * Pino logger setup for Lootcase
 */

import { pino, type Logger } from 'pino'
import { getLogLevel, isDevelopment } from '../config.js'

// Vitest sets NODE_ENV=test; keep test output plain and quiet
const usePretty = isDevelopment() && process.env.NODE_ENV !== 'test'

const transport = usePretty
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    }
  : undefined

export const logger = pino({
  level: process.env.NODE_ENV === 'test' ? process.env.LOG_LEVEL || 'silent' : getLogLevel(),
  transport,
})

/**
 * Create a child logger with additional context
 */
export function createLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings)
}
