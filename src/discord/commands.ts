/**
 * Slash command definitions
 */

import { SlashCommandBuilder } from 'discord.js'

export const FORGET_COMMAND = 'forget'
export const CREATE_THREAD_COMMAND = 'createthread'

export const slashCommands = [
  new SlashCommandBuilder()
    .setName(FORGET_COMMAND)
    .setDescription('Forget message history')
    .addStringOption((option) =>
      option.setName('persona').setDescription('Persona of bot').setRequired(false)
    ),
  new SlashCommandBuilder()
    .setName(CREATE_THREAD_COMMAND)
    .setDescription('Create a thread in which bot will respond to every message.')
    .addStringOption((option) =>
      option.setName('name').setDescription('Thread name').setRequired(true).setMaxLength(100)
    ),
]
