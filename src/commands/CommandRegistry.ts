import { Command, CommandRegistry as ICommandRegistry } from './types'

/**
 * Commands by name and alias, matched case-insensitively. `getAll` keeps
 * registration order for the help listing.
 */
export class CommandRegistry implements ICommandRegistry {
  private lookup = new Map<string, Command>()
  private ordered: Command[] = []

  constructor(commands: Command[] = []) {
    for (const command of commands) {
      this.register(command)
    }
  }

  register(command: Command): void {
    const keys = [command.name, ...(command.aliases ?? [])].map(key => key.toLowerCase())

    for (const key of keys) {
      const existing = this.lookup.get(key)
      if (existing) {
        throw new Error(`Cannot register command '${command.name}': '${key}' is already taken by '${existing.name}'`)
      }
    }
    if (new Set(keys).size !== keys.length) {
      throw new Error(`Cannot register command '${command.name}': its name and aliases repeat`)
    }

    for (const key of keys) {
      this.lookup.set(key, command)
    }
    this.ordered.push(command)
  }

  get(name: string): Command | undefined {
    return this.lookup.get(name.toLowerCase())
  }

  getAll(): Command[] {
    return [...this.ordered]
  }
}
