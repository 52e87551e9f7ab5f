/**
 * History normalization
 *
 * Persisted logs and configured templates arrive in several loose shapes:
 * bare string parts, single parts not wrapped in a list, binary parts in the
 * API's `inlineData` form or the older `mime_type`/`data` form. Everything is
 * converted to the `Turn`/`Part` union here. Conversion never throws.
 */

import {
  BotError,
  fail,
  ok,
  textPart,
  type Part,
  type Result,
  type Role,
  type Turn,
} from '../types.js'

/** JSON shape written to the history store (mirrors the API's Content type). */
export type SerializedPart =
  | { text: string }
  | { inlineData: { mimeType: string; data: string } }

export interface SerializedTurn {
  role: Role
  parts: SerializedPart[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isRole(value: unknown): value is Role {
  return value === 'user' || value === 'model'
}

function toBuffer(value: unknown): Buffer | null {
  if (Buffer.isBuffer(value)) return value
  if (value instanceof Uint8Array) return Buffer.from(value)
  if (typeof value === 'string') return Buffer.from(value, 'base64')
  // JSON.stringify(Buffer) produces { type: 'Buffer', data: number[] }
  if (isRecord(value) && value.type === 'Buffer') {
    const bytes: unknown = value.data
    if (Array.isArray(bytes)) {
      return Buffer.from(bytes.filter((n): n is number => typeof n === 'number'))
    }
  }
  return null
}

function binaryFrom(contentType: unknown, data: unknown): Part | null {
  if (typeof contentType !== 'string') return null
  const buffer = toBuffer(data)
  if (!buffer) return null
  return { type: 'binary', contentType, data: buffer }
}

/**
 * Convert one loose part. Returns null for parts that carry nothing
 * (`null`/`undefined`).
 */
export function normalizePart(part: unknown): Part | null {
  if (part === null || part === undefined) {
    return null
  }
  if (typeof part === 'string') {
    return textPart(part)
  }
  if (!isRecord(part)) {
    return textPart(String(part))
  }

  const { text, inlineData } = part
  if (part.type === 'binary') {
    const binary = binaryFrom(part.contentType, part.data)
    if (binary) return binary
  }
  if (typeof text === 'string') {
    return textPart(text)
  }
  if (isRecord(inlineData)) {
    const binary = binaryFrom(inlineData.mimeType, inlineData.data)
    if (binary) return binary
  }
  if ('mime_type' in part) {
    const binary = binaryFrom(part.mime_type, part.data)
    if (binary) return binary
  }

  return textPart(JSON.stringify(part))
}

/**
 * Convert one loose turn. A turn without a usable role or without parts is
 * dropped (null) rather than given a guessed role.
 */
export function normalizeTurn(turn: unknown): Turn | null {
  if (!isRecord(turn)) {
    return null
  }
  const { role, parts: loose } = turn
  if (!isRole(role) || loose === undefined) {
    return null
  }

  const rawParts: unknown[] = Array.isArray(loose) ? loose : [loose]
  const parts: Part[] = []
  for (const raw of rawParts) {
    const part = normalizePart(raw)
    if (part) parts.push(part)
  }

  return { role, parts }
}

export interface NormalizedLog {
  turns: Turn[]
  /** Entries that were not turns and were left out. */
  dropped: number
}

/**
 * Convert a whole persisted log or template.
 */
export function normalizeLog(raw: unknown): Result<NormalizedLog> {
  if (!Array.isArray(raw)) {
    return fail(new BotError('normalization', 'Conversation log is not a list', {
      receivedType: raw === null ? 'null' : typeof raw,
    }))
  }

  const turns: Turn[] = []
  let dropped = 0
  for (const item of raw) {
    const turn = normalizeTurn(item)
    if (turn) {
      turns.push(turn)
    } else {
      dropped++
    }
  }

  return ok({ turns, dropped })
}

/** Templates are validated as lists when the config loads. */
export function normalizeTemplate(template: readonly unknown[]): Turn[] {
  const result = normalizeLog([...template])
  return result.ok ? result.value.turns : []
}

function serializePart(part: Part): SerializedPart {
  if (part.type === 'text') {
    return { text: part.text }
  }
  return { inlineData: { mimeType: part.contentType, data: part.data.toString('base64') } }
}

export function serializeLog(log: Turn[]): SerializedTurn[] {
  return log.map((turn) => ({ role: turn.role, parts: turn.parts.map(serializePart) }))
}

/** Deep copy, so sessions never share part arrays with templates or callers. */
export function cloneLog(log: Turn[]): Turn[] {
  return log.map((turn) => ({ role: turn.role, parts: turn.parts.map((part) => ({ ...part })) }))
}
