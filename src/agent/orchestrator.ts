/**
 * Message Orchestrator
 *
 * Per inbound message:
 *   filter → attachments → quoted message → query → generate → dispatch → persist
 *
 * Work for one channel is serialized through the keyed queue; different
 * channels proceed concurrently. Every failure is handled here and turned
 * into a reply, nothing escapes to the event loop.
 */

import {
  binaryPart,
  textPart,
  type AttachmentData,
  type BotError,
  type Part,
  type Result,
} from '../types.js'
import { fetchAttachments, type Fetcher } from '../discord/attachments.js'
import { buildQuery, type QuotedContent } from '../context/query.js'
import { chunkText, dispatchChunks } from '../discord/dispatch.js'
import { toBotError } from '../discord/errors.js'
import type { InboundMessage } from '../discord/surface.js'
import type { SessionRegistry } from '../session/registry.js'
import { serializeLog } from '../session/normalize.js'
import type { HistoryStore } from '../storage/history-store.js'
import type { ErrorLog } from '../utils/error-log.js'
import type { TrackedThreads } from './tracked-threads.js'
import { KeyedQueue } from './keyed-queue.js'
import { logger } from '../utils/logger.js'

export const REPLY_ATTACHMENT_ERROR = 'An error occurred while processing your attachments.'
export const REPLY_UNSUPPORTED_ATTACHMENTS = 'Attachments are of unsupported file types.'
export const REPLY_TOO_LONG = 'The message is too long for me to process.'
export const REPLY_GENERIC_ERROR = 'An error occurred while processing your message.'

const TYPING_REFRESH_MS = 8000

/** Where handling of a message ended up. */
export type MessageOutcome =
  | 'filtered_out'
  | 'attachments_invalid'
  | 'attachments_unsupported'
  | 'generation_failed'
  | 'failed'
  | 'persisted'

export interface OrchestratorDeps {
  registry: SessionRegistry
  store: HistoryStore
  threads: TrackedThreads
  errorLog: ErrorLog
  queue: KeyedQueue
  fetcher?: Fetcher
}

export interface OrchestratorOptions {
  trackedChannels: readonly string[]
  template: readonly unknown[]
  maxMessageLength: number
  maxBackoffMs?: number
}

interface ResolvedQuote {
  quoted: QuotedContent | null
  attachments: AttachmentData[]
}

export class MessageOrchestrator {
  private botUserId?: string
  private trackedChannels: Set<string>

  constructor(
    private deps: OrchestratorDeps,
    private options: OrchestratorOptions
  ) {
    this.trackedChannels = new Set(options.trackedChannels)
  }

  /**
   * Set bot's Discord user ID (called after Discord connects)
   */
  setBotUserId(userId: string): void {
    this.botUserId = userId
  }

  shouldRespond(message: InboundMessage): boolean {
    if (!this.botUserId || message.authorId === this.botUserId) {
      return false
    }
    if (message.mentionsEveryone) {
      return false
    }
    return message.mentionsBot
      || message.isDirectMessage
      || this.trackedChannels.has(message.channelId)
      || this.deps.threads.has(message.channelId)
  }

  async handleMessage(message: InboundMessage): Promise<MessageOutcome> {
    if (!this.shouldRespond(message)) {
      return 'filtered_out'
    }
    return this.deps.queue.run(message.channelId, () => this.process(message))
  }

  // ============================================================================
  // Private methods
  // ============================================================================

  private async process(message: InboundMessage): Promise<MessageOutcome> {
    const { channelId } = message
    const { registry } = this.deps
    const stopTyping = this.startTyping(message)
    let requestText = message.cleanContent

    logger.info({ channelId, author: message.authorName, content: message.content }, 'Handling message')

    try {
      let attachments: AttachmentData[] = []
      if (message.attachments.length > 0) {
        const fetched = await fetchAttachments(message.attachments, this.deps.fetcher)
        if (!fetched.ok) {
          this.report(channelId, requestText, fetched.error)
          await this.notify(message, REPLY_ATTACHMENT_ERROR)
          return 'attachments_invalid'
        }
        if (fetched.value.length === 0) {
          logger.info({ channelId, count: message.attachments.length }, 'All attachments unsupported')
          await this.notify(message, REPLY_UNSUPPORTED_ATTACHMENTS)
          return 'attachments_unsupported'
        }
        attachments = fetched.value
      }

      const quote = await this.resolveQuote(message)
      if (!quote.ok) {
        this.report(channelId, requestText, quote.error)
        await this.notify(message, REPLY_ATTACHMENT_ERROR)
        return 'attachments_invalid'
      }

      requestText = buildQuery({
        authorName: message.authorName,
        messageText: message.cleanContent,
        hasAttachments: message.attachments.length > 0,
        quoted: quote.value.quoted,
      })

      const parts: Part[] = [
        ...attachments.map(binaryPart),
        ...quote.value.attachments.map(binaryPart),
        textPart(requestText),
      ]

      const generated = await registry.appendAndGenerate(channelId, parts, this.options.template)
      if (!generated.ok) {
        this.report(channelId, requestText, generated.error)
        await this.notify(message, REPLY_GENERIC_ERROR)
        return 'generation_failed'
      }

      // The log is persisted even when a later chunk fails to send
      let deliveryError: unknown = null
      try {
        const chunks = chunkText(generated.value, this.options.maxMessageLength)
        await dispatchChunks(chunks, message, this.options.maxBackoffMs)
        logger.info({ channelId, chunks: chunks.length, length: generated.value.length }, 'Reply delivered')
      } catch (error) {
        deliveryError = error
      }

      try {
        await this.deps.store.saveHistory(channelId, serializeLog(registry.getLog(channelId)))
      } catch (error) {
        logger.error({ error, channelId }, 'Failed to save conversation history')
        // The answer is already out; only a failed delivery is reported to the user
        if (deliveryError === null) {
          return 'failed'
        }
      }

      if (deliveryError !== null) {
        throw deliveryError
      }
      return 'persisted'
    } catch (error) {
      const failure = toBotError(error)
      if (failure.kind === 'transport') {
        this.report(channelId, requestText, failure)
      } else {
        logger.error({ error: failure, channelId, kind: failure.kind }, 'Failed to handle message')
      }
      await this.notify(message, failure.kind === 'too_large' ? REPLY_TOO_LONG : REPLY_GENERIC_ERROR)
      return 'failed'
    } finally {
      stopTyping()
    }
  }

  /**
   * The replied-to message becomes part of the query unless the bot wrote it.
   * Its supported attachments ride along with this turn.
   */
  private async resolveQuote(message: InboundMessage): Promise<Result<ResolvedQuote>> {
    const quoted = await message.fetchQuoted()
    if (!quoted || quoted.authorId === this.botUserId) {
      return { ok: true, value: { quoted: null, attachments: [] } }
    }

    const content: QuotedContent = { authorName: quoted.authorName, text: quoted.cleanContent }
    if (quoted.attachments.length === 0) {
      return { ok: true, value: { quoted: content, attachments: [] } }
    }

    const fetched = await fetchAttachments(quoted.attachments, this.deps.fetcher)
    if (!fetched.ok) {
      return fetched
    }
    return { ok: true, value: { quoted: content, attachments: fetched.value } }
  }

  private report(channelId: string, requestText: string, error: BotError): void {
    logger.error({ channelId, kind: error.kind, error }, 'Request failed')
    this.deps.errorLog.record({
      channelId,
      requestText,
      error,
      history: this.deps.registry.getLog(channelId),
    })
  }

  private async notify(message: InboundMessage, content: string): Promise<void> {
    try {
      await message.send(content)
    } catch (error) {
      logger.error({ error, channelId: message.channelId }, 'Failed to send failure notice')
    }
  }

  /**
   * Typing indicator for the duration of processing (refreshes every 8 seconds)
   */
  private startTyping(message: InboundMessage): () => void {
    const send = () => {
      message.sendTyping().catch((error: unknown) => {
        logger.warn({ error, channelId: message.channelId }, 'Failed to send typing')
      })
    }
    send()
    const interval = setInterval(send, TYPING_REFRESH_MS)
    return () => clearInterval(interval)
  }
}
