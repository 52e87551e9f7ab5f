/**
 * Conversation Session Registry
 *
 * One session per channel: the ordered turn log plus the live chat handle used
 * to continue it. The log is the source of truth; the handle is rebuilt from
 * it whenever it might have drifted (after a failure or an empty reply).
 */

import { BotError, fail, ok, textPart, type Part, type Result, type Turn } from '../types.js'
import type { ChatHandle, GenerationBackend } from '../llm/backend.js'
import { cloneLog, normalizeLog, normalizeTemplate } from './normalize.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('sessions')

/**
 * `inline` keeps attachment bytes in the log (re-sent on every later turn);
 * `placeholder` swaps them for a short text marker once the turn is committed.
 */
export type AttachmentHistoryPolicy = 'inline' | 'placeholder'

interface Session {
  log: Turn[]
  handle: ChatHandle | null
}

function attachmentPlaceholder(contentType: string): string {
  return `[attachment: ${contentType}]`
}

export class SessionRegistry {
  private sessions = new Map<string, Session>()

  constructor(
    private backend: GenerationBackend,
    private attachmentHistory: AttachmentHistoryPolicy = 'inline'
  ) {}

  /**
   * Seed sessions from persisted logs. A channel whose data cannot be
   * converted starts empty; the rest keep loading.
   */
  load(histories: Map<string, unknown>): void {
    let loaded = 0
    for (const [channelId, raw] of histories) {
      const result = normalizeLog(raw)
      if (!result.ok) {
        logger.warn({ channelId, error: result.error }, 'Could not load history for channel, starting fresh')
        this.sessions.set(channelId, { log: [], handle: null })
        continue
      }
      if (result.value.dropped > 0) {
        logger.warn({ channelId, dropped: result.value.dropped }, 'Dropped malformed turns from persisted history')
      }
      this.sessions.set(channelId, { log: result.value.turns, handle: null })
      loaded++
    }
    logger.info({ channels: histories.size, loaded }, 'Loaded conversation histories')
  }

  has(channelId: string): boolean {
    return this.sessions.has(channelId)
  }

  ensureSession(channelId: string, template: readonly unknown[]): void {
    this.sessionFor(channelId, template)
  }

  /**
   * Submit a user turn and return the model's text. The log only changes when
   * generation succeeds, so a failure never leaves a user turn without a reply.
   */
  async appendAndGenerate(
    channelId: string,
    parts: Part[],
    template: readonly unknown[]
  ): Promise<Result<string>> {
    const session = this.sessionFor(channelId, template)

    let handle = session.handle
    if (!handle) {
      try {
        handle = this.backend.startChat(cloneLog(session.log))
      } catch (error) {
        logger.warn({ channelId, error }, 'Could not start chat from history')
        return fail(new BotError('transport', 'Could not start chat from history', {
          turns: session.log.length,
        }, { cause: error }))
      }
      session.handle = handle
    }

    const result = await handle.send(parts)

    // The session may have been reset or deleted while the request was in flight
    if (this.sessions.get(channelId) !== session) {
      logger.info({ channelId }, 'Session replaced during generation, reply not recorded')
      return result
    }

    if (!result.ok) {
      session.handle = null
      return fail(result.error)
    }

    const text = result.value
    session.log.push({ role: 'user', parts: this.committedParts(parts) })
    if (text) {
      session.log.push({ role: 'model', parts: [textPart(text)] })
    }
    if (!text || this.attachmentHistory === 'placeholder') {
      session.handle = null
    }

    return ok(text)
  }

  reset(channelId: string, template: readonly unknown[]): void {
    this.sessions.set(channelId, { log: normalizeTemplate(template), handle: null })
    logger.info({ channelId, turns: template.length }, 'Session reset')
  }

  delete(channelId: string): void {
    if (this.sessions.delete(channelId)) {
      logger.info({ channelId }, 'Session deleted')
    }
  }

  getLog(channelId: string): Turn[] {
    return [...(this.sessions.get(channelId)?.log ?? [])]
  }

  private sessionFor(channelId: string, template: readonly unknown[]): Session {
    const existing = this.sessions.get(channelId)
    if (existing) {
      return existing
    }
    const session: Session = { log: normalizeTemplate(template), handle: null }
    this.sessions.set(channelId, session)
    logger.debug({ channelId, turns: session.log.length }, 'Created session from template')
    return session
  }

  private committedParts(parts: Part[]): Part[] {
    if (this.attachmentHistory === 'inline') {
      return [...parts]
    }
    return parts.map((part) =>
      part.type === 'binary' ? textPart(attachmentPlaceholder(part.contentType)) : part
    )
  }
}
