/**
 * Gemini Discord Relay
 * Main entry point
 */

import { config as loadEnv } from 'dotenv'
import { ConfigSystem } from './config/system.js'
import { JsonHistoryStore } from './storage/history-store.js'
import { SessionRegistry } from './session/registry.js'
import { TrackedThreads } from './agent/tracked-threads.js'
import { KeyedQueue } from './agent/keyed-queue.js'
import { MessageOrchestrator } from './agent/orchestrator.js'
import { CommandHandlers } from './agent/commands.js'
import { DiscordConnector } from './discord/connector.js'
import { GeminiBackend } from './llm/gemini.js'
import { MockBackend } from './llm/mock.js'
import type { GenerationBackend } from './llm/backend.js'
import { FileErrorLog } from './utils/error-log.js'
import { logger } from './utils/logger.js'

const MAX_BACKOFF_MS = 32_000

async function main() {
  try {
    loadEnv({ path: '.env' })
    loadEnv({ path: '.env.development' })

    logger.info('Starting Gemini relay')

    const configPath = process.env.CONFIG_PATH || './config/bot.yaml'
    const configSystem = new ConfigSystem(configPath)
    const config = configSystem.loadBotConfig()
    const useMock = Boolean(process.env.MOCK_LLM)
    const secrets = configSystem.loadSecrets({ requireGoogleKey: !useMock })

    logger.info({
      configPath,
      model: config.model,
      trackedChannels: config.tracked_channels.length,
      templateTurns: config.template.length,
      dataDir: config.data_dir,
      attachmentHistory: config.attachment_history,
    }, 'Configuration loaded')

    let backend: GenerationBackend
    if (useMock || !secrets.googleApiKey) {
      backend = new MockBackend()
      logger.info('Using MockBackend (MOCK_LLM=1) - no real API calls')
    } else {
      backend = new GeminiBackend({ apiKey: secrets.googleApiKey, config })
    }

    // Initialize components
    const store = new JsonHistoryStore(config.data_dir)
    const registry = new SessionRegistry(backend, config.attachment_history)
    registry.load(await store.loadHistories())

    const threads = new TrackedThreads(store)
    await threads.load()

    const queue = new KeyedQueue()
    const errorLog = new FileErrorLog(config.data_dir)

    const orchestrator = new MessageOrchestrator(
      { registry, store, threads, errorLog, queue },
      {
        trackedChannels: config.tracked_channels,
        template: config.template,
        maxMessageLength: config.max_message_length,
        maxBackoffMs: MAX_BACKOFF_MS,
      }
    )
    const commands = new CommandHandlers({ registry, store, threads, queue, template: config.template })

    const connector = new DiscordConnector(
      {
        onMessage: (message) => orchestrator.handleMessage(message),
        onForget: (invocation, persona) => commands.forget(invocation, persona),
        onCreateThread: (invocation, name) => commands.createThread(invocation, name),
        onThreadDeleted: (threadId) => threads.remove(threadId),
      },
      { token: secrets.discordToken, activity: config.activity, maxBackoffMs: MAX_BACKOFF_MS }
    )

    await connector.start()

    const botUserId = connector.getBotUserId()
    if (!botUserId) {
      throw new Error('Failed to get bot identity from Discord')
    }
    orchestrator.setBotUserId(botUserId)
    logger.info({ botUserId }, 'Bot identity established')

    // Handle shutdown
    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Shutting down')
      await connector.close()
      await store.flush()
      errorLog.flush()
      process.exit(0)
    }

    const onSignal = (signal: string) => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ error }, 'Shutdown failed')
        process.exit(1)
      })
    }
    process.on('SIGINT', () => onSignal('SIGINT'))
    process.on('SIGTERM', () => onSignal('SIGTERM'))
  } catch (error) {
    logger.fatal({ error }, 'Fatal error')
    process.exit(1)
  }
}

// Run
main().catch((error) => {
  console.error('Unhandled error:', error)
  process.exit(1)
})
