import { describe, it, expect } from 'vitest'
import { MOCK_RESPONSE, MockBackend } from './mock.js'
import { textPart } from '../types.js'

describe('MockBackend', () => {
  it('answers every turn with the fixed reply', async () => {
    const chat = new MockBackend().startChat([])
    expect(await chat.send([textPart('@alice said "hi"')])).toEqual({ ok: true, value: MOCK_RESPONSE })
  })
})
