import { BuildSession, InputError, RunOutcome } from '../contracts'
import { ReconcileInput, ReconcileInputSchema } from '../contracts/schemas'
import { ConfigLoader } from '../config/ConfigLoader'
import { Log } from '../logging'
import { buildSession } from '../project'
import { RecordedRecipeEngine } from '../recipes'
import { ResultsContainer } from '../results'
import { listResults } from './listResults'

export interface ReconcileContext {
  readInput: () => Promise<ReconcileInput>
  configLoader: ConfigLoader
  log: Log
  repositoryRoot?: (buildRoot: string) => string
}

export function parseInput(raw: string): ReconcileInput {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new InputError('Input is not valid JSON', { cause: error })
  }

  const result = ReconcileInputSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.errors
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new InputError(`Invalid input document: ${issues}`, { cause: result.error })
  }
  return result.data
}

export async function sessionFor(context: ReconcileContext): Promise<BuildSession> {
  const input = await context.readInput()
  return buildSession(input.session, context.configLoader.getConfig().localRepository)
}

export async function listResultsFor(context: ReconcileContext): Promise<ResultsContainer> {
  const input = await context.readInput()
  return listResults({
    session: buildSession(input.session, context.configLoader.getConfig().localRepository),
    engine: new RecordedRecipeEngine(input),
    config: context.configLoader.getConfig(),
    activeRecipes: context.configLoader.getActiveRecipes(input.activeRecipes),
    log: context.log,
    repositoryRoot: context.repositoryRoot,
  })
}

export function formatOutcome(outcome: RunOutcome): string {
  const lines = [
    `Run ${outcome.runId}: ${outcome.status}`,
    `   Project root: ${outcome.projectRoot}`,
    `   Generated: ${outcome.counts.generated}`,
    `   Deleted: ${outcome.counts.deleted}`,
    `   Moved: ${outcome.counts.moved}`,
    `   Refactored in place: ${outcome.counts.refactoredInPlace}`,
  ]
  if (outcome.error) {
    lines.push(`   Error: ${outcome.error}`)
  }
  return lines.join('\n')
}
