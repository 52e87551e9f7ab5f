/**
 * Structured logging (pino)
 */

import pino from 'pino'

const isUnitTest = process.env.VITEST !== undefined

export const logger = pino({
  name: 'gemini-relay',
  level: process.env.LOG_LEVEL ?? (isUnitTest ? 'silent' : 'info'),
  redact: ['token', 'apiKey', '*.token', '*.apiKey'],
  serializers: {
    error: pino.stdSerializers.err,
  },
})

export function createLogger(name: string): pino.Logger {
  return logger.child({ module: name })
}
