/**
 * Retry helpers for Discord REST calls
 */

import { DiscordAPIError, HTTPError, RateLimitError } from 'discord.js'
import { logger } from './logger.js'

const MAX_ATTEMPTS = 5

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Whether a Discord call is worth repeating: rate limits, server errors and
 * dropped connections. Anything else (bad request, missing permission) is not.
 */
export function isRetryableDiscordError(error: unknown): boolean {
  if (error instanceof RateLimitError) {
    return true
  }
  if (error instanceof DiscordAPIError || error instanceof HTTPError) {
    return error.status === 429 || error.status >= 500
  }
  if (error instanceof Error) {
    const code = 'code' in error ? String(error.code) : ''
    return code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'UND_ERR_SOCKET'
  }
  return false
}

/**
 * Run a Discord call, retrying transient failures with exponential backoff
 * (baseDelayMs, doubled per attempt, capped at maxBackoffMs).
 */
export async function retryDiscord<T>(
  fn: () => Promise<T>,
  maxBackoffMs: number,
  baseDelayMs: number = 1000
): Promise<T> {
  let attempt = 0

  for (;;) {
    try {
      return await fn()
    } catch (error) {
      attempt++
      if (attempt >= MAX_ATTEMPTS || !isRetryableDiscordError(error)) {
        throw error
      }

      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxBackoffMs)
      logger.warn({ error, attempt, delay }, 'Discord call failed, retrying')
      await sleep(delay)
    }
  }
}
