/**
 * Discord Connector
 * Handles all Discord API interactions
 */

import {
  ActivityType,
  ChannelType,
  Client,
  Events,
  GatewayIntentBits,
  Partials,
  RESTJSONErrorCodes,
  ThreadAutoArchiveDuration,
  DiscordAPIError,
  type ChatInputCommandInteraction,
  type Interaction,
  type Message,
} from 'discord.js'
import { BotError, type AttachmentRef } from '../types.js'
import { CREATE_THREAD_COMMAND, FORGET_COMMAND, slashCommands } from './commands.js'
import {
  CANNOT_HOST_THREADS,
  type CommandInvocation,
  type InboundMessage,
  type QuotedMessage,
  type ReplyAnchor,
} from './surface.js'
import { logger } from '../utils/logger.js'
import { retryDiscord } from '../utils/retry.js'

export interface ConnectorOptions {
  token: string
  activity: string
  maxBackoffMs: number
}

export interface ConnectorHandlers {
  onMessage(message: InboundMessage): Promise<unknown>
  onForget(invocation: CommandInvocation, persona: string | null): Promise<void>
  onCreateThread(invocation: CommandInvocation, name: string): Promise<void>
  onThreadDeleted(threadId: string): Promise<void>
}

function attachmentRefs(message: Message): AttachmentRef[] {
  return message.attachments.map((attachment) => ({ url: attachment.url, filename: attachment.name }))
}

export class DiscordConnector {
  private client: Client

  constructor(
    private handlers: ConnectorHandlers,
    private options: ConnectorOptions
  ) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages,
      ],
      // DM channels are not cached until a message arrives in them
      partials: [Partials.Channel],
      presence: {
        activities: [{ name: options.activity, type: ActivityType.Playing }],
      },
    })

    this.setupEventHandlers()
  }

  /**
   * Log in, wait for the gateway to be ready and register slash commands
   */
  async start(): Promise<void> {
    const ready = new Promise<void>((resolve) => {
      this.client.once(Events.ClientReady, () => resolve())
    })

    try {
      await this.client.login(this.options.token)
      await ready
      logger.info({ userId: this.client.user?.id, tag: this.client.user?.tag }, 'Discord connector started')
    } catch (error) {
      logger.error({ error }, 'Failed to start Discord connector')
      throw new BotError('transport', 'Failed to connect to Discord', {}, { cause: error })
    }

    await this.registerCommands()
  }

  /**
   * Get bot's Discord user ID
   */
  getBotUserId(): string | undefined {
    return this.client.user?.id
  }

  /**
   * Close the Discord client
   */
  async close(): Promise<void> {
    await this.client.destroy()
    logger.info('Discord connector closed')
  }

  // ===========================================================================
  // Event handling
  // ===========================================================================

  private setupEventHandlers(): void {
    this.client.on(Events.MessageCreate, (message) => {
      logger.debug({
        messageId: message.id,
        channelId: message.channelId,
        author: message.author.username,
        content: message.content.substring(0, 50),
      }, 'Received messageCreate event')

      this.handlers.onMessage(this.toInbound(message)).catch((error: unknown) => {
        logger.error({ error, messageId: message.id }, 'Unhandled error in message handler')
      })
    })

    this.client.on(Events.InteractionCreate, (interaction) => {
      this.handleInteraction(interaction).catch((error: unknown) => {
        logger.error({ error, interactionId: interaction.id }, 'Unhandled error in command handler')
      })
    })

    this.client.on(Events.ThreadDelete, (thread) => {
      this.handlers.onThreadDeleted(thread.id).catch((error: unknown) => {
        logger.error({ error, threadId: thread.id }, 'Failed to untrack deleted thread')
      })
    })
  }

  private async registerCommands(): Promise<void> {
    const application = this.client.application
    if (!application) {
      throw new BotError('transport', 'Discord application is not available after login')
    }
    await application.commands.set(slashCommands.map((command) => command.toJSON()))
    logger.info({ commands: slashCommands.map((command) => command.name) }, 'Slash commands registered')
  }

  private async handleInteraction(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand()) {
      return
    }

    logger.info({
      command: interaction.commandName,
      channelId: interaction.channelId,
      user: interaction.user.username,
    }, 'Received slash command')

    // Channel work may be queued behind a generation; defer so the interaction stays valid
    await interaction.deferReply()
    const invocation = this.toInvocation(interaction)

    switch (interaction.commandName) {
      case FORGET_COMMAND:
        await this.handlers.onForget(invocation, interaction.options.getString('persona'))
        break
      case CREATE_THREAD_COMMAND:
        await this.handlers.onCreateThread(invocation, interaction.options.getString('name', true))
        break
      default:
        logger.warn({ command: interaction.commandName }, 'Unknown slash command')
        await interaction.editReply('Unknown command.')
    }
  }

  // ===========================================================================
  // Adapters
  // ===========================================================================

  private toInbound(message: Message): InboundMessage {
    const botUserId = this.client.user?.id

    return {
      id: message.id,
      channelId: message.channelId,
      authorId: message.author.id,
      authorName: message.author.username,
      content: message.content,
      cleanContent: message.cleanContent,
      attachments: attachmentRefs(message),
      mentionsBot: botUserId ? message.mentions.has(botUserId, { ignoreEveryone: true }) : false,
      mentionsEveryone: message.mentions.everyone,
      isDirectMessage: message.channel.type === ChannelType.DM,
      fetchQuoted: () => this.fetchQuoted(message),
      reply: (content) => this.replyTo(message, content),
      send: (content) => this.sendToChannel(message, content),
      sendTyping: async () => {
        if (message.channel.isSendable()) {
          await message.channel.sendTyping()
        }
      },
    }
  }

  private toAnchor(message: Message): ReplyAnchor {
    return { reply: (content) => this.replyTo(message, content) }
  }

  private toInvocation(interaction: ChatInputCommandInteraction): CommandInvocation {
    return {
      channelId: interaction.channelId,
      reply: async (content) => {
        await interaction.editReply(content)
      },
      createThread: (name) => this.createThread(interaction, name),
    }
  }

  private async fetchQuoted(message: Message): Promise<QuotedMessage | null> {
    if (!message.reference?.messageId) {
      return null
    }

    try {
      const referenced = await retryDiscord(() => message.fetchReference(), this.options.maxBackoffMs)
      return {
        authorId: referenced.author.id,
        authorName: referenced.author.username,
        cleanContent: referenced.cleanContent,
        attachments: attachmentRefs(referenced),
      }
    } catch (error) {
      logger.warn({ error, messageId: message.id, referenceId: message.reference.messageId }, 'Could not fetch replied-to message')
      return null
    }
  }

  /**
   * Reply to a message. If the target was deleted meanwhile, post to the
   * channel instead so the answer is not lost.
   */
  private async replyTo(message: Message, content: string): Promise<ReplyAnchor> {
    try {
      const sent = await message.reply({ content })
      return this.toAnchor(sent)
    } catch (error) {
      if (error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.UnknownMessage && message.channel.isSendable()) {
        logger.warn({ messageId: message.id, channelId: message.channelId }, 'Reply target deleted, sending without reply')
        const sent = await message.channel.send({ content })
        return this.toAnchor(sent)
      }
      throw error
    }
  }

  private async sendToChannel(message: Message, content: string): Promise<void> {
    const channel = message.channel
    if (!channel.isSendable()) {
      throw new BotError('transport', `Channel ${message.channelId} does not accept messages`)
    }
    await retryDiscord<Message>(() => channel.send({ content }), this.options.maxBackoffMs)
  }

  private async createThread(interaction: ChatInputCommandInteraction, name: string): Promise<string> {
    const channel = interaction.channel
    if (!channel || channel.type !== ChannelType.GuildText) {
      throw new BotError('command', 'Threads can only be created in text channels', {
        reason: CANNOT_HOST_THREADS,
        channelId: interaction.channelId,
      })
    }

    const thread = await retryDiscord(
      () => channel.threads.create({ name, autoArchiveDuration: ThreadAutoArchiveDuration.OneHour }),
      this.options.maxBackoffMs
    )
    return thread.id
  }
}
