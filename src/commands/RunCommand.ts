import { Command } from './types'
import { CleanupError, CommandOutcome } from '../contracts'
import { formatOutcome, listResultsFor, ReconcileContext } from '../reconcile'
import { ChangeApplier, ResultsReporter } from '../results'

export const RunCommand: Command = {
  name: 'run',
  aliases: ['apply'],
  description: 'Apply what the active recipes changed and remove directories left empty',
  execute: async (context: ReconcileContext): Promise<CommandOutcome> => {
    const results = await listResultsFor(context)
    const outcome = new ResultsReporter(context.log, 'run').report(results)
    const warnings: string[] = []

    // A recipe error fails the run before anything is written
    if (outcome.status !== 'changes') {
      return {
        exitCode: outcome.status === 'failed' ? 1 : 0,
        output: formatOutcome(outcome),
        warnings,
      }
    }

    const applied = await new ChangeApplier(results).apply()
    let output = formatOutcome(outcome)
    output += `\n   Files written: ${applied.written.length}`
    output += `\n   Files removed: ${applied.removed.length}`

    if (context.configLoader.getConfig().cleanEmptyDirectories) {
      try {
        const removed = await results.newlyEmptyDirectories()
        for (const directory of removed) {
          context.log.info(`Removed empty directory ${directory}`)
        }
        output += `\n   Empty directories removed: ${removed.length}`
      } catch (error) {
        if (!(error instanceof CleanupError)) {
          throw error
        }
        context.log.warn(error.message, error)
        warnings.push(error.message)
        output += `\n   Empty directories removed: ${error.removed.length}`
      }
    }

    return { exitCode: 0, output, warnings }
  }
}
