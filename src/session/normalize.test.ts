import { describe, it, expect } from 'vitest'
import {
  cloneLog,
  normalizeLog,
  normalizePart,
  normalizeTemplate,
  normalizeTurn,
  serializeLog,
} from './normalize.js'
import { binaryPart, textPart, type Turn } from '../types.js'

describe('normalizePart', () => {
  it('wraps bare strings as text', () => {
    expect(normalizePart('hi')).toEqual(textPart('hi'))
  })

  it('returns null for missing parts', () => {
    expect(normalizePart(null)).toBeNull()
    expect(normalizePart(undefined)).toBeNull()
  })

  it('stringifies scalars', () => {
    expect(normalizePart(42)).toEqual(textPart('42'))
    expect(normalizePart(true)).toEqual(textPart('true'))
  })

  it('reads text records', () => {
    expect(normalizePart({ text: 'hello' })).toEqual(textPart('hello'))
  })

  it('reads inlineData binaries from base64', () => {
    const part = normalizePart({ inlineData: { mimeType: 'image/png', data: Buffer.from('png').toString('base64') } })
    expect(part).toEqual(binaryPart({ contentType: 'image/png', data: Buffer.from('png') }))
  })

  it('reads the older mime_type/data form', () => {
    const part = normalizePart({ mime_type: 'audio/mp3', data: Buffer.from('mp3').toString('base64') })
    expect(part).toEqual(binaryPart({ contentType: 'audio/mp3', data: Buffer.from('mp3') }))
  })

  it('reads JSON-serialized Buffers', () => {
    const part = normalizePart({ type: 'binary', contentType: 'text/md', data: { type: 'Buffer', data: [104, 105] } })
    expect(part).toEqual(binaryPart({ contentType: 'text/md', data: Buffer.from('hi') }))
  })

  it('falls back to the JSON text of unknown records', () => {
    expect(normalizePart({ foo: 1 })).toEqual(textPart('{"foo":1}'))
  })
})

describe('normalizeTurn', () => {
  it('wraps a single part in a list', () => {
    expect(normalizeTurn({ role: 'user', parts: 'hello' })).toEqual({ role: 'user', parts: [textPart('hello')] })
  })

  it('drops turns without a valid role or parts', () => {
    expect(normalizeTurn({ role: 'system', parts: ['x'] })).toBeNull()
    expect(normalizeTurn({ parts: ['x'] })).toBeNull()
    expect(normalizeTurn({ role: 'model' })).toBeNull()
    expect(normalizeTurn('user: hi')).toBeNull()
  })

  it('skips null parts inside the list', () => {
    expect(normalizeTurn({ role: 'model', parts: [null, 'ok'] })).toEqual({ role: 'model', parts: [textPart('ok')] })
  })
})

describe('normalizeLog', () => {
  it('normalizes a mixed log and counts dropped entries', () => {
    const result = normalizeLog([
      { role: 'user', parts: ['Hello'] },
      { role: 'model', parts: [{ text: 'Hi!' }] },
      { role: 'narrator', parts: ['?'] },
      7,
    ])

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.turns).toEqual([
      { role: 'user', parts: [textPart('Hello')] },
      { role: 'model', parts: [textPart('Hi!')] },
    ])
    expect(result.value.dropped).toBe(2)
  })

  it('fails on a non-list log', () => {
    const result = normalizeLog({ role: 'user' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('normalization')
    expect(result.error.details).toEqual({ receivedType: 'object' })
  })

  it('reports null logs by name', () => {
    const result = normalizeLog(null)
    expect(!result.ok && result.error.details).toEqual({ receivedType: 'null' })
  })
})

describe('normalizeTemplate', () => {
  it('returns normalized turns', () => {
    expect(normalizeTemplate([{ role: 'user', parts: 'be brief' }, { role: 'model', parts: ['Ok!'] }])).toEqual([
      { role: 'user', parts: [textPart('be brief')] },
      { role: 'model', parts: [textPart('Ok!')] },
    ])
  })
})

describe('serializeLog', () => {
  it('writes binaries as base64 inlineData that normalizes back to the same log', () => {
    const log: Turn[] = [
      { role: 'user', parts: [binaryPart({ contentType: 'image/png', data: Buffer.from([0, 1, 2, 255]) }), textPart('@alice sent attachments:')] },
      { role: 'model', parts: [textPart('A picture.')] },
    ]

    const serialized = serializeLog(log)
    expect(serialized[0]?.parts[0]).toEqual({ inlineData: { mimeType: 'image/png', data: 'AAEC/w==' } })

    const restored = normalizeLog(JSON.parse(JSON.stringify(serialized)))
    expect(restored.ok && restored.value.turns).toEqual(log)
  })
})

describe('cloneLog', () => {
  it('does not share part arrays with the source', () => {
    const log: Turn[] = [{ role: 'user', parts: [textPart('a')] }]
    const copy = cloneLog(log)
    copy[0]?.parts.push(textPart('b'))
    expect(log[0]?.parts).toHaveLength(1)
  })
})
