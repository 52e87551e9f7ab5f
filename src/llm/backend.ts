/**
 * Generation backend boundary
 */

import type { Part, Result, Turn } from '../types.js'

/**
 * Live continuation of one conversation. `send` submits a user turn on top of
 * the history the handle was started with and resolves with the generated
 * text ('' when the model produced none). Failures are returned, not thrown.
 */
export interface ChatHandle {
  send(parts: Part[]): Promise<Result<string>>
}

export interface GenerationBackend {
  startChat(history: Turn[]): ChatHandle
}
