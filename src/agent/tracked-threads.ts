/**
 * Tracked Threads
 * Threads created with /createthread, where the bot answers every message
 */

import type { HistoryStore } from '../storage/history-store.js'
import { logger } from '../utils/logger.js'

export class TrackedThreads {
  private threads = new Set<string>()

  constructor(private store: HistoryStore) {}

  async load(): Promise<void> {
    this.threads = new Set(await this.store.loadTrackedThreads())
    logger.info({ count: this.threads.size }, 'Loaded tracked threads')
  }

  has(threadId: string): boolean {
    return this.threads.has(threadId)
  }

  async add(threadId: string): Promise<void> {
    if (this.threads.has(threadId)) {
      return
    }
    this.threads.add(threadId)
    await this.store.saveTrackedThreads(this.list())
    logger.info({ threadId }, 'Thread tracked')
  }

  async remove(threadId: string): Promise<void> {
    if (!this.threads.delete(threadId)) {
      return
    }
    await this.store.saveTrackedThreads(this.list())
    logger.info({ threadId }, 'Thread untracked')
  }

  list(): string[] {
    return Array.from(this.threads)
  }
}
