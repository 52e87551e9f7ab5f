/**
 * Response Dispatcher
 * Splits generated text into Discord-sized pieces and sends them as a reply chain
 */

import type { ReplyAnchor } from './surface.js'
import { retryDiscord } from '../utils/retry.js'

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff
}

/**
 * Contiguous slices of at most `maxLength` UTF-16 units. Joining the result
 * gives back `text`; an empty text still yields one (empty) chunk so the bot
 * always answers. A slice never ends between the two halves of a surrogate
 * pair unless `maxLength` is 1.
 */
export function chunkText(text: string, maxLength: number): string[] {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`)
  }
  if (text.length <= maxLength) {
    return [text]
  }

  const chunks: string[] = []
  let start = 0
  while (start < text.length) {
    let end = Math.min(start + maxLength, text.length)
    if (end < text.length && end - 1 > start && isHighSurrogate(text.charCodeAt(end - 1))) {
      end--
    }
    chunks.push(text.substring(start, end))
    start = end
  }
  return chunks
}

/**
 * Send chunks in order, each replying to the previous one. Returns the sent
 * messages.
 */
export async function dispatchChunks(
  chunks: string[],
  origin: ReplyAnchor,
  maxBackoffMs: number = 32_000
): Promise<ReplyAnchor[]> {
  const sent: ReplyAnchor[] = []
  let anchor = origin

  for (const chunk of chunks) {
    const target = anchor
    anchor = await retryDiscord(() => target.reply(chunk), maxBackoffMs)
    sent.push(anchor)
  }

  return sent
}
