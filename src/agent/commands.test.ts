import { describe, it, expect, beforeEach } from 'vitest'
import {
  CommandHandlers,
  REPLY_COMMAND_FAILED,
  REPLY_HISTORY_ERASED,
  REPLY_NO_CHANNEL,
  REPLY_NOT_TEXT_CHANNEL,
  REPLY_THREAD_FAILED,
  personaTurns,
} from './commands.js'
import { KeyedQueue } from './keyed-queue.js'
import { TrackedThreads } from './tracked-threads.js'
import { SessionRegistry } from '../session/registry.js'
import { MockBackend } from '../llm/mock.js'
import { CANNOT_HOST_THREADS, type CommandInvocation } from '../discord/surface.js'
import type { HistoryStore } from '../storage/history-store.js'
import { BotError, textPart } from '../types.js'

class MemoryStore implements HistoryStore {
  histories = new Map<string, unknown>()
  threads: string[] = []
  failDeletes = false

  async loadHistories() { return new Map(this.histories) }
  async loadTrackedThreads() { return [...this.threads] }
  async saveHistory(channelId: string, log: unknown) { this.histories.set(channelId, log) }
  async deleteHistory(channelId: string) {
    if (this.failDeletes) throw new Error('disk full')
    this.histories.delete(channelId)
  }
  async saveTrackedThreads(threadIds: string[]) { this.threads = [...threadIds] }
  async flush() {}
}

interface FakeInvocation extends CommandInvocation {
  replies: string[]
}

function fakeInvocation(channelId: string | null, createThread?: (name: string) => Promise<string>): FakeInvocation {
  const replies: string[] = []
  return {
    channelId,
    replies,
    reply: async (content: string) => {
      replies.push(content)
    },
    createThread: createThread ?? (async () => '555'),
  }
}

const TEMPLATE = [{ role: 'user', parts: ['Be kind.'] }, { role: 'model', parts: ['Ok!'] }]

describe('personaTurns', () => {
  it('builds the reseeding exchange', () => {
    expect(personaTurns('a pirate')).toEqual([
      { role: 'user', parts: ['Forget what I said earlier! You are a pirate'] },
      { role: 'model', parts: ['Ok!'] },
    ])
  })
})

describe('CommandHandlers', () => {
  let store: MemoryStore
  let registry: SessionRegistry
  let threads: TrackedThreads
  let handlers: CommandHandlers

  beforeEach(() => {
    store = new MemoryStore()
    registry = new SessionRegistry(new MockBackend())
    threads = new TrackedThreads(store)
    handlers = new CommandHandlers({ registry, store, threads, queue: new KeyedQueue(), template: TEMPLATE })
  })

  describe('forget', () => {
    it('erases the session and its stored history', async () => {
      await registry.appendAndGenerate('100', [textPart('hi')], TEMPLATE)
      await store.saveHistory('100', ['anything'])
      const invocation = fakeInvocation('100')

      await handlers.forget(invocation)

      expect(invocation.replies).toEqual([REPLY_HISTORY_ERASED])
      expect(registry.has('100')).toBe(false)
      expect(store.histories.has('100')).toBe(false)
    })

    it('reseeds the channel with a persona', async () => {
      const invocation = fakeInvocation('100')

      await handlers.forget(invocation, 'a pirate')

      const expected = [
        { role: 'user', parts: [textPart('Be kind.')] },
        { role: 'model', parts: [textPart('Ok!')] },
        { role: 'user', parts: [textPart('Forget what I said earlier! You are a pirate')] },
        { role: 'model', parts: [textPart('Ok!')] },
      ]
      expect(registry.getLog('100')).toEqual(expected)
      expect(store.histories.get('100')).toEqual([
        { role: 'user', parts: [{ text: 'Be kind.' }] },
        { role: 'model', parts: [{ text: 'Ok!' }] },
        { role: 'user', parts: [{ text: 'Forget what I said earlier! You are a pirate' }] },
        { role: 'model', parts: [{ text: 'Ok!' }] },
      ])
      expect(invocation.replies).toEqual([REPLY_HISTORY_ERASED])
    })

    it('treats an empty persona as none', async () => {
      await handlers.forget(fakeInvocation('100'), '')
      expect(registry.has('100')).toBe(false)
    })

    it('needs a channel', async () => {
      const invocation = fakeInvocation(null)
      await handlers.forget(invocation, 'a pirate')
      expect(invocation.replies).toEqual([REPLY_NO_CHANNEL])
    })

    it('reports store failures', async () => {
      store.failDeletes = true
      const invocation = fakeInvocation('100')

      await handlers.forget(invocation)

      expect(invocation.replies).toEqual([REPLY_COMMAND_FAILED])
    })
  })

  describe('createThread', () => {
    it('creates and tracks the thread', async () => {
      const invocation = fakeInvocation('100', async () => '777')

      await handlers.createThread(invocation, 'ideas')

      expect(invocation.replies).toEqual(['Thread ideas created!'])
      expect(threads.has('777')).toBe(true)
      expect(store.threads).toEqual(['777'])
    })

    it('refuses channels that cannot host threads', async () => {
      const invocation = fakeInvocation('100', async () => {
        throw new BotError('command', 'Threads can only be created in text channels', { reason: CANNOT_HOST_THREADS })
      })

      await handlers.createThread(invocation, 'ideas')

      expect(invocation.replies).toEqual([REPLY_NOT_TEXT_CHANNEL])
      expect(threads.list()).toEqual([])
    })

    it('reports other creation failures', async () => {
      const invocation = fakeInvocation('100', async () => {
        throw new Error('Missing Permissions')
      })

      await handlers.createThread(invocation, 'ideas')

      expect(invocation.replies).toEqual([REPLY_THREAD_FAILED])
    })

    it('needs a channel', async () => {
      const invocation = fakeInvocation(null)
      await handlers.createThread(invocation, 'ideas')
      expect(invocation.replies).toEqual([REPLY_NO_CHANNEL])
    })
  })
})
