/**
 * History Store
 *
 * Durable key-value file mapping channel ids to serialized conversation logs,
 * plus the reserved `tracked_threads` key. All writes go through a single
 * chain and land atomically (temp file + rename), so concurrent saves for
 * different channels never clobber each other.
 */

import { readFile, writeFile, mkdir, rename } from 'fs/promises'
import { existsSync } from 'fs'
import { join, dirname } from 'path'
import { logger } from '../utils/logger.js'

export const TRACKED_THREADS_KEY = 'tracked_threads'

export interface HistoryStore {
  /** Raw persisted logs keyed by channel id. Values are normalized by the caller. */
  loadHistories(): Promise<Map<string, unknown>>
  loadTrackedThreads(): Promise<string[]>
  saveHistory(channelId: string, log: unknown): Promise<void>
  deleteHistory(channelId: string): Promise<void>
  saveTrackedThreads(threadIds: string[]): Promise<void>
  /** Resolves once every pending write has reached disk. */
  flush(): Promise<void>
}

type StoreData = Record<string, unknown>

function isChannelKey(key: string): boolean {
  return /^\d+$/.test(key)
}

export class JsonHistoryStore implements HistoryStore {
  private data: StoreData | null = null
  private writeChain: Promise<void> = Promise.resolve()
  private storePath: string

  constructor(dataDir: string = './data') {
    this.storePath = join(dataDir, 'chatdata.json')
  }

  async loadHistories(): Promise<Map<string, unknown>> {
    const data = await this.read()
    const histories = new Map<string, unknown>()
    for (const [key, value] of Object.entries(data)) {
      if (isChannelKey(key)) {
        histories.set(key, value)
      }
    }
    return histories
  }

  async loadTrackedThreads(): Promise<string[]> {
    const data = await this.read()
    const stored = data[TRACKED_THREADS_KEY]
    if (!Array.isArray(stored)) {
      return []
    }
    return stored.map((id) => String(id))
  }

  saveHistory(channelId: string, log: unknown): Promise<void> {
    return this.update((data) => {
      data[channelId] = log
    })
  }

  deleteHistory(channelId: string): Promise<void> {
    return this.update((data) => {
      delete data[channelId]
    })
  }

  saveTrackedThreads(threadIds: string[]): Promise<void> {
    return this.update((data) => {
      data[TRACKED_THREADS_KEY] = [...threadIds]
    })
  }

  flush(): Promise<void> {
    return this.writeChain
  }

  // ============================================================================
  // Private methods
  // ============================================================================

  private async read(): Promise<StoreData> {
    if (this.data) {
      return this.data
    }

    if (!existsSync(this.storePath)) {
      logger.debug({ storePath: this.storePath }, 'No history store found, starting fresh')
      this.data = {}
      return this.data
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(await readFile(this.storePath, 'utf-8'))
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error
      }
      // Keep the unreadable file aside; the next write would replace it
      const corruptPath = `${this.storePath}.corrupt-${Date.now()}`
      await rename(this.storePath, corruptPath)
      logger.warn({ error, storePath: this.storePath, corruptPath }, 'History store is not valid JSON, starting fresh')
      this.data = {}
      return this.data
    }

    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      logger.warn({ storePath: this.storePath }, 'History store is not an object, starting fresh')
      this.data = {}
    } else {
      this.data = { ...parsed }
    }
    return this.data
  }

  /**
   * Queue a mutation. The in-memory copy and the file are both updated inside
   * the chain, so each write sees every mutation queued before it.
   */
  private update(mutate: (data: StoreData) => void): Promise<void> {
    const next = this.writeChain.then(async () => {
      const data = await this.read()
      mutate(data)
      await this.write(data)
    })
    // A failed write must not wedge the chain for later writers
    this.writeChain = next.catch((error: unknown) => {
      logger.error({ error, storePath: this.storePath }, 'History store write failed')
    })
    return next
  }

  private async write(data: StoreData): Promise<void> {
    const dir = dirname(this.storePath)
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true })
    }

    const tmpPath = `${this.storePath}.tmp`
    await writeFile(tmpPath, JSON.stringify(data))
    await rename(tmpPath, this.storePath)
    logger.debug({ keys: Object.keys(data).length }, 'Saved history store')
  }
}
