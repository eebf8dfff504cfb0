export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { RootCommand } from './RootCommand'
export { DryRunCommand } from './DryRunCommand'
export { RunCommand } from './RunCommand'
export { createHelpCommand } from './HelpCommand'

import { CommandRegistry } from './CommandRegistry'
import { RootCommand } from './RootCommand'
import { DryRunCommand } from './DryRunCommand'
import { RunCommand } from './RunCommand'
import { createHelpCommand } from './HelpCommand'

export const defaultCommands = [
  RootCommand,
  DryRunCommand,
  RunCommand,
]

export function createDefaultRegistry(): CommandRegistry {
  const registry = new CommandRegistry(defaultCommands)
  registry.register(createHelpCommand(() => registry.getAll()))
  return registry
}
