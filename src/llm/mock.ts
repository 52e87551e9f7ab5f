/**
 * Mock backend
 *
 * Returns instant responses for exercising the message pipeline
 * without real API calls. Enable with MOCK_LLM=1 env var.
 */

import { ok, type Part, type Result, type Turn } from '../types.js'
import type { ChatHandle, GenerationBackend } from './backend.js'

export const MOCK_RESPONSE = '[mock response]'

export class MockBackend implements GenerationBackend {
  startChat(_history: Turn[]): ChatHandle {
    return {
      async send(_parts: Part[]): Promise<Result<string>> {
        return ok(MOCK_RESPONSE)
      },
    }
  }
}
