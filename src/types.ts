/**
 * Shared types for the relay
 */

// ============================================================================
// Conversation
// ============================================================================

export type Role = 'user' | 'model'

export interface TextPart {
  type: 'text'
  text: string
}

export interface BinaryPart {
  type: 'binary'
  contentType: string
  data: Buffer
}

export type Part = TextPart | BinaryPart

export interface Turn {
  role: Role
  parts: Part[]
}

export interface AttachmentData {
  contentType: string
  data: Buffer
}

export interface AttachmentRef {
  url: string
  filename: string
}

export function textPart(text: string): TextPart {
  return { type: 'text', text }
}

export function binaryPart(attachment: AttachmentData): BinaryPart {
  return { type: 'binary', contentType: attachment.contentType, data: attachment.data }
}

// ============================================================================
// Errors
// ============================================================================

export type FailureKind =
  | 'transport'      // attachment fetch or generation call failed
  | 'unsupported'    // every attachment had an unsupported type
  | 'too_large'      // Discord rejected a reply body
  | 'normalization'  // persisted history could not be converted
  | 'command'        // slash command could not be carried out
  | 'config'         // startup configuration missing or invalid

export class BotError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'BotError'
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: BotError }

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function fail<T>(error: BotError): Result<T> {
  return { ok: false, error }
}
