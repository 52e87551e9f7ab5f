/**
 * Command Handlers
 * /forget and /createthread
 */

import { BotError } from '../types.js'
import { CANNOT_HOST_THREADS, type CommandInvocation } from '../discord/surface.js'
import type { SessionRegistry } from '../session/registry.js'
import { serializeLog } from '../session/normalize.js'
import type { HistoryStore } from '../storage/history-store.js'
import type { TrackedThreads } from './tracked-threads.js'
import type { KeyedQueue } from './keyed-queue.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('commands')

export const REPLY_NO_CHANNEL = 'Error: Cannot determine channel.'
export const REPLY_HISTORY_ERASED = 'Message history for channel erased.'
export const REPLY_COMMAND_FAILED = 'An error occurred while processing your command.'
export const REPLY_NOT_TEXT_CHANNEL = 'Error: Can only create threads in text channels.'
export const REPLY_THREAD_FAILED = 'Error creating thread!'

/**
 * The two turns that reseed a conversation with a new persona.
 */
export function personaTurns(persona: string): Array<{ role: string; parts: string[] }> {
  return [
    { role: 'user', parts: [`Forget what I said earlier! You are ${persona}`] },
    { role: 'model', parts: ['Ok!'] },
  ]
}

export interface CommandDeps {
  registry: SessionRegistry
  store: HistoryStore
  threads: TrackedThreads
  queue: KeyedQueue
  template: readonly unknown[]
}

export class CommandHandlers {
  constructor(private deps: CommandDeps) {}

  /**
   * Erase the channel's conversation; with a persona, start over as that persona.
   */
  async forget(invocation: CommandInvocation, persona?: string | null): Promise<void> {
    const { channelId } = invocation
    if (!channelId) {
      await this.safeReply(invocation, REPLY_NO_CHANNEL)
      return
    }

    try {
      await this.deps.queue.run(channelId, async () => {
        const { registry, store, template } = this.deps
        registry.delete(channelId)
        await store.deleteHistory(channelId)

        if (persona) {
          registry.reset(channelId, [...template, ...personaTurns(persona)])
          await store.saveHistory(channelId, serializeLog(registry.getLog(channelId)))
        }
      })

      logger.info({ channelId, persona: persona ?? null }, 'History forgotten')
      await invocation.reply(REPLY_HISTORY_ERASED)
    } catch (error) {
      logger.error({ error, channelId }, 'forget command failed')
      await this.safeReply(invocation, REPLY_COMMAND_FAILED)
    }
  }

  /**
   * Create a thread under the invoking channel and answer every message in it.
   */
  async createThread(invocation: CommandInvocation, name: string): Promise<void> {
    if (!invocation.channelId) {
      await this.safeReply(invocation, REPLY_NO_CHANNEL)
      return
    }

    try {
      const threadId = await invocation.createThread(name)
      await this.deps.threads.add(threadId)
      logger.info({ threadId, name, parentId: invocation.channelId }, 'Thread created')
      await invocation.reply(`Thread ${name} created!`)
    } catch (error) {
      if (error instanceof BotError && error.details.reason === CANNOT_HOST_THREADS) {
        await this.safeReply(invocation, REPLY_NOT_TEXT_CHANNEL)
        return
      }
      logger.error({ error, channelId: invocation.channelId }, 'createthread command failed')
      await this.safeReply(invocation, REPLY_THREAD_FAILED)
    }
  }

  private async safeReply(invocation: CommandInvocation, content: string): Promise<void> {
    try {
      await invocation.reply(content)
    } catch (error) {
      logger.error({ error, channelId: invocation.channelId }, 'Failed to reply to command')
    }
  }
}
