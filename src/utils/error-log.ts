/**
 * Error Log
 *
 * Generation and transport failures are written here with everything needed to
 * reproduce them: the request text, the stack, a snapshot of the channel's
 * conversation and whatever diagnostic fields the API returned.
 */

import { join } from 'path'
import pino from 'pino'
import type { BotError, Turn } from '../types.js'

export interface FailureReport {
  channelId: string
  requestText: string
  error: BotError
  history: Turn[]
}

export interface ErrorLog {
  record(report: FailureReport): void
  flush(): void
}

/**
 * Render a log for the error file. Binary payloads are replaced by their size
 * so the file stays readable.
 */
export function snapshotHistory(history: Turn[]): unknown[] {
  return history.map((turn) => ({
    role: turn.role,
    parts: turn.parts.map((part) =>
      part.type === 'text'
        ? { text: part.text }
        : { contentType: part.contentType, bytes: part.data.length }
    ),
  }))
}

export class FileErrorLog implements ErrorLog {
  private readonly destination: pino.DestinationStream & { flushSync(): void }
  private readonly log: pino.Logger

  constructor(dataDir: string) {
    this.destination = pino.destination({ dest: join(dataDir, 'errors.log'), mkdir: true, sync: false })
    this.log = pino({ base: null, level: 'error' }, this.destination)
  }

  record(report: FailureReport): void {
    const { error } = report
    this.log.error({
      channelId: report.channelId,
      requestText: report.requestText,
      kind: error.kind,
      stack: error.stack,
      cause: error.cause instanceof Error ? error.cause.stack : error.cause,
      history: snapshotHistory(report.history),
      candidates: error.details.candidates ?? 'N/A',
      promptFeedback: error.details.promptFeedback ?? 'N/A',
      details: error.details,
    }, error.message)
  }

  flush(): void {
    this.destination.flushSync()
  }
}
