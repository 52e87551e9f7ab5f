/**
 * Gemini backend
 *
 * Wraps @google/generative-ai chat sessions behind the GenerationBackend
 * boundary. Each request carries its own abort signal; a call that outlives
 * it resolves as a transport failure.
 */

import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
  type ChatSession,
  type Content,
  type GenerateContentResponse,
  type GenerativeModel,
  type Part as SdkPart,
  type SafetySetting,
} from '@google/generative-ai'
import { BotError, fail, ok, type Part, type Result, type Turn } from '../types.js'
import type { BotConfig } from '../config/system.js'
import type { ChatHandle, GenerationBackend } from './backend.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('gemini')

export function toSdkPart(part: Part): SdkPart {
  if (part.type === 'text') {
    return { text: part.text }
  }
  return { inlineData: { mimeType: part.contentType, data: part.data.toString('base64') } }
}

/**
 * Chat history for the SDK. Turns with no parts are skipped, and so is
 * everything before the first user turn: the API requires history to open
 * with one.
 */
export function toContents(history: Turn[]): Content[] {
  const turns = history.filter((turn) => turn.parts.length > 0)
  const first = turns.findIndex((turn) => turn.role === 'user')
  if (first === -1) {
    return []
  }
  return turns.slice(first).map((turn) => ({ role: turn.role, parts: turn.parts.map(toSdkPart) }))
}

/**
 * Translate whatever the SDK threw into a transport failure carrying the
 * diagnostic fields the API returned (candidates, prompt feedback, status).
 */
export function toGenerationFailure(error: unknown, timedOut: boolean): BotError {
  const details: Record<string, unknown> = { timedOut }
  let response: GenerateContentResponse | undefined

  if (error instanceof GoogleGenerativeAIResponseError) {
    response = error.response
  }
  if (error instanceof GoogleGenerativeAIFetchError) {
    details.status = error.status
    details.statusText = error.statusText
    details.errorDetails = error.errorDetails
  }
  if (response) {
    details.candidates = response.candidates
    details.promptFeedback = response.promptFeedback
  }

  const message = timedOut
    ? 'Generation request timed out'
    : error instanceof Error ? error.message : String(error)

  return new BotError('transport', message, details, { cause: error })
}

class GeminiChatHandle implements ChatHandle {
  constructor(
    private chat: ChatSession,
    private timeoutMs: number
  ) {}

  async send(parts: Part[]): Promise<Result<string>> {
    const signal = AbortSignal.timeout(this.timeoutMs)
    try {
      const result = await this.chat.sendMessage(parts.map(toSdkPart), { signal })
      // text() throws GoogleGenerativeAIResponseError when the prompt or candidate was blocked
      const text = result.response.text()
      logger.debug({
        finishReason: result.response.candidates?.[0]?.finishReason,
        length: text.length,
      }, 'Generation complete')
      return ok(text)
    } catch (error) {
      return fail(toGenerationFailure(error, signal.aborted))
    }
  }
}

export interface GeminiBackendOptions {
  apiKey: string
  config: Pick<BotConfig, 'model' | 'generation' | 'safety_settings'>
}

export class GeminiBackend implements GenerationBackend {
  private model: GenerativeModel
  private timeoutMs: number

  constructor(options: GeminiBackendOptions) {
    const { generation, safety_settings, model } = options.config
    const safetySettings: SafetySetting[] = safety_settings.map((s) => ({
      category: s.category,
      threshold: s.threshold,
    }))

    this.model = new GoogleGenerativeAI(options.apiKey).getGenerativeModel({
      model,
      generationConfig: {
        temperature: generation.temperature,
        topP: generation.top_p,
        topK: generation.top_k,
        maxOutputTokens: generation.max_output_tokens,
      },
      safetySettings,
    })
    this.timeoutMs = generation.timeout_ms

    logger.info({ model, timeoutMs: this.timeoutMs }, 'Gemini backend initialized')
  }

  startChat(history: Turn[]): ChatHandle {
    return new GeminiChatHandle(this.model.startChat({ history: toContents(history) }), this.timeoutMs)
  }
}
