import fs from 'fs'
import { CommandOutcome } from '../contracts'
import { ReconcileInput } from '../contracts/schemas'
import { ConfigLoader } from '../config/ConfigLoader'
import { createDefaultRegistry } from '../commands'
import { ConsoleLog, debugLog, Log } from '../logging'
import { parseInput } from '../reconcile'

export interface CliArgs {
  command: string
  inputFile?: string
  configPath?: string
}

export function parseArgs(argv: string[]): CliArgs {
  const [command = 'help', ...rest] = argv
  const args: CliArgs = { command }

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i]
    if (arg === '--config' || arg === '-c') {
      const value = rest[i + 1]
      if (value === undefined) {
        throw new Error(`${arg} requires a path`)
      }
      args.configPath = value
      i++
    } else if (arg.startsWith('--config=')) {
      args.configPath = arg.slice('--config='.length)
    } else if (args.inputFile === undefined) {
      args.inputFile = arg
    } else {
      throw new Error(`Unexpected argument: ${arg}`)
    }
  }

  return args
}

export interface RunDeps {
  readStdin: () => Promise<string>
  log?: Log
  cwd?: string
}

export async function run(argv: string[], deps: RunDeps): Promise<CommandOutcome> {
  const args = parseArgs(argv)
  const registry = createDefaultRegistry()
  const command = registry.get(args.command)
  if (!command) {
    return {
      exitCode: 1,
      output: `Unknown command: ${args.command}. Run "reconcile help" to list commands.`,
      warnings: [],
    }
  }

  let input: Promise<ReconcileInput> | undefined
  const readInput = (): Promise<ReconcileInput> => {
    if (!input) {
      const raw = args.inputFile ? fs.promises.readFile(args.inputFile, 'utf8') : deps.readStdin()
      input = raw.then(parseInput)
    }
    return input
  }

  debugLog({ event: 'command_start', command: command.name, inputFile: args.inputFile ?? 'stdin' })
  const outcome = await command.execute({
    readInput,
    configLoader: new ConfigLoader(args.configPath, deps.cwd),
    log: deps.log ?? new ConsoleLog(),
  }, argv.slice(1))
  debugLog({ event: 'command_end', command: command.name, exitCode: outcome.exitCode })

  return outcome
}
