import { Command } from './types'
import { CommandOutcome } from '../contracts'
import { locateRepositoryRoot, resolveBuildRoot } from '../project'
import { ReconcileContext, sessionFor } from '../reconcile'

export const RootCommand: Command = {
  name: 'root',
  aliases: ['roots'],
  description: 'Show the resolved build root and repository root',
  execute: async (context: ReconcileContext): Promise<CommandOutcome> => {
    const buildRoot = resolveBuildRoot(await sessionFor(context))
    const repositoryRoot = (context.repositoryRoot ?? locateRepositoryRoot)(buildRoot)

    return {
      exitCode: 0,
      output: `Build root: ${buildRoot}\nRepository root: ${repositoryRoot}`,
      warnings: [],
    }
  }
}
