/**
 * Discord-facing surface
 *
 * The connector adapts discord.js objects to these shapes, so the message
 * pipeline and command handlers never touch the client directly.
 */

import type { AttachmentRef } from '../types.js'

/** A sent (or received) message that further replies can hang off. */
export interface ReplyAnchor {
  reply(content: string): Promise<ReplyAnchor>
}

export interface QuotedMessage {
  authorId: string
  authorName: string
  /** Mention-resolved text */
  cleanContent: string
  attachments: AttachmentRef[]
}

export interface InboundMessage extends ReplyAnchor {
  id: string
  channelId: string
  authorId: string
  authorName: string
  content: string
  /** Text with user/channel mentions resolved to display names */
  cleanContent: string
  attachments: AttachmentRef[]
  mentionsBot: boolean
  mentionsEveryone: boolean
  isDirectMessage: boolean
  /** The replied-to message, or null when this is not a reply or it is gone. */
  fetchQuoted(): Promise<QuotedMessage | null>
  /** Post to the channel without replying. */
  send(content: string): Promise<void>
  sendTyping(): Promise<void>
}

/** `details.reason` of the BotError thrown when a channel cannot host threads */
export const CANNOT_HOST_THREADS = 'cannot_host_threads'

export interface CommandInvocation {
  channelId: string | null
  reply(content: string): Promise<void>
  /**
   * Create a thread under the invoking channel and return its id. Throws a
   * `command` BotError when the channel cannot host threads.
   */
  createThread(name: string): Promise<string>
}
