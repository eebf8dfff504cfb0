import { Command } from './types'
import { CommandOutcome } from '../contracts'

export const createHelpCommand = (listCommands: () => Command[]): Command => ({
  name: 'help',
  aliases: ['--help', '-h'],
  description: 'List available commands',
  execute: async (): Promise<CommandOutcome> => {
    let message = 'Usage: reconcile <command> [input.json] [--config <path>]\n\nCommands:\n'
    for (const command of listCommands()) {
      const aliases = command.aliases?.length ? ` (${command.aliases.join(', ')})` : ''
      message += `   ${command.name}${aliases} - ${command.description}\n`
    }
    message += '\nThe input document is read from stdin when no file is given.'
    return { exitCode: 0, output: message, warnings: [] }
  }
})
