import { CommandOutcome } from '../contracts'
import { ReconcileContext } from '../reconcile'

export interface Command {
  name: string
  aliases?: string[]
  description: string
  execute: (context: ReconcileContext, args: string[]) => Promise<CommandOutcome>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
}
