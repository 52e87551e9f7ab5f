/**
 * Config System
 * Loads bot settings from YAML and secrets from the environment
 */

import { existsSync, readFileSync } from 'fs'
import { join } from 'path'
import { parse } from 'yaml'
import { z } from 'zod'
import { HarmBlockThreshold, HarmCategory } from '@google/generative-ai'
import { BotError } from '../types.js'

const templateTurnSchema = z.object({
  role: z.string().optional(),
  parts: z.unknown().optional(),
})

const botConfigSchema = z.object({
  model: z.string().default('gemini-2.0-flash'),
  tracked_channels: z.array(z.union([
    z.string().regex(/^\d+$/, 'must be a channel id'),
    // Snowflakes above 2^53 lose digits when YAML reads them as numbers
    z.number().int().refine(Number.isSafeInteger, 'channel ids this large must be quoted'),
  ]).transform(String)).default([]),
  generation: z.object({
    temperature: z.number().min(0).max(2).default(0.9),
    top_p: z.number().min(0).max(1).default(1),
    top_k: z.number().int().positive().default(1),
    max_output_tokens: z.number().int().positive().optional(),
    timeout_ms: z.number().int().positive().default(60_000),
  }).default({}),
  safety_settings: z.array(z.object({
    category: z.nativeEnum(HarmCategory),
    threshold: z.nativeEnum(HarmBlockThreshold),
  })).default([]),
  template: z.array(templateTurnSchema).default([]),
  max_message_length: z.number().int().positive().max(2000).default(1700),
  activity: z.string().default('with your feelings'),
  data_dir: z.string().default('./data'),
  attachment_history: z.enum(['inline', 'placeholder']).default('inline'),
})

export type BotConfig = z.infer<typeof botConfigSchema>

export interface Secrets {
  discordToken: string
  googleApiKey: string | undefined
}

/**
 * Parse and validate a YAML config document. An empty document yields defaults.
 */
export function parseBotConfig(source: string, origin: string = 'config'): BotConfig {
  let raw: unknown
  try {
    raw = parse(source) ?? {}
  } catch (error) {
    throw new BotError('config', `Could not parse ${origin}`, {}, { cause: error })
  }

  const result = botConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    throw new BotError('config', `Invalid ${origin}: ${issues.join('; ')}`, { issues })
  }
  return result.data
}

export class ConfigSystem {
  constructor(
    private configPath: string,
    private env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Load bot settings. A missing file means all defaults.
   */
  loadBotConfig(): BotConfig {
    if (!existsSync(this.configPath)) {
      return parseBotConfig('', this.configPath)
    }
    return parseBotConfig(readFileSync(this.configPath, 'utf-8'), this.configPath)
  }

  /**
   * Read credentials. The Discord token comes from DISCORD_BOT_TOKEN or, failing
   * that, from a token file (DISCORD_TOKEN_FILE, default ./discord_token).
   */
  loadSecrets(options: { requireGoogleKey: boolean }): Secrets {
    let discordToken = this.env.DISCORD_BOT_TOKEN?.trim()

    if (!discordToken) {
      const tokenFile = this.env.DISCORD_TOKEN_FILE ?? join(process.cwd(), 'discord_token')
      if (existsSync(tokenFile)) {
        discordToken = readFileSync(tokenFile, 'utf-8').trim()
      }
    }

    if (!discordToken) {
      throw new BotError('config', 'DISCORD_BOT_TOKEN is not set and no discord_token file was found')
    }

    const googleApiKey = this.env.GOOGLE_AI_KEY?.trim() || undefined
    if (options.requireGoogleKey && !googleApiKey) {
      throw new BotError('config', 'GOOGLE_AI_KEY is not set')
    }

    return { discordToken, googleApiKey }
  }
}
