import { Command } from './types'
import { CommandOutcome } from '../contracts'
import { formatOutcome, listResultsFor, ReconcileContext } from '../reconcile'
import { ResultsReporter, writePatch } from '../results'

export const DryRunCommand: Command = {
  name: 'dry-run',
  aliases: ['dryrun', 'check'],
  description: 'Report what the active recipes would change and write a patch file',
  execute: async (context: ReconcileContext): Promise<CommandOutcome> => {
    const results = await listResultsFor(context)
    const outcome = new ResultsReporter(context.log, 'dry-run').report(results)

    let output = formatOutcome(outcome)
    if (outcome.status === 'changes') {
      const patchFile = await writePatch(results, context.configLoader.getConfig().reportOutputDirectory)
      context.log.warn(`Patch file available: ${patchFile}`)
      output += `\n   Patch: ${patchFile}`
    }

    return {
      exitCode: outcome.status === 'failed' ? 1 : 0,
      output,
      warnings: [],
    }
  }
}
