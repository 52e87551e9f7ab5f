/**
 * Mapping of thrown errors to failure kinds
 */

import { DiscordAPIError, RESTJSONErrorCodes } from 'discord.js'
import { BotError } from '../types.js'

/** Discord's "Invalid Form Body"; for a plain reply it means the content was too long. */
export function isInvalidFormBody(error: unknown): boolean {
  return error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.InvalidFormBodyOrContentType
}

export function toBotError(error: unknown): BotError {
  if (error instanceof BotError) {
    return error
  }
  if (isInvalidFormBody(error)) {
    return new BotError('too_large', 'Discord rejected the reply body', {}, { cause: error })
  }
  const message = error instanceof Error ? error.message : String(error)
  const details: Record<string, unknown> = {}
  if (error instanceof DiscordAPIError) {
    details.code = error.code
    details.status = error.status
  }
  return new BotError('transport', message, details, { cause: error })
}
