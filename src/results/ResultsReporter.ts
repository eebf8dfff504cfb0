import { v4 as uuidv4 } from 'uuid'
import { RunOutcome, TransformationResult } from '../contracts'
import { Log } from '../logging'
import { describeRecipesThatMadeChanges } from '../recipes'
import { ResultsContainer } from './ResultsContainer'

export type ReportMode = 'dry-run' | 'run'

const HEADINGS: Record<ReportMode, {
  generated: (r: TransformationResult) => string
  deleted: (r: TransformationResult) => string
  moved: (r: TransformationResult) => string
  refactoredInPlace: (r: TransformationResult) => string
}> = {
  'dry-run': {
    generated: r => `These recipes would generate new file ${r.after?.sourcePath}:`,
    deleted: r => `These recipes would delete file ${r.before?.sourcePath}:`,
    moved: r => `These recipes would move file from ${r.before?.sourcePath} to ${r.after?.sourcePath}:`,
    refactoredInPlace: r => `These recipes would make changes to ${r.before?.sourcePath}:`,
  },
  run: {
    generated: r => `Generated new file ${r.after?.sourcePath} by:`,
    deleted: r => `Deleted file ${r.before?.sourcePath} by:`,
    moved: r => `File has been moved from ${r.before?.sourcePath} to ${r.after?.sourcePath} by:`,
    refactoredInPlace: r => `Changes have been made to ${r.before?.sourcePath} by:`,
  },
}

export class ResultsReporter {
  constructor(private log: Log, private mode: ReportMode) {}

  /**
   * Log every classified result with the recipes responsible for it and
   * summarize the run
   */
  report(results: ResultsContainer): RunOutcome {
    const headings = HEADINGS[this.mode]
    const counts = {
      generated: results.generated.length,
      deleted: results.deleted.length,
      moved: results.moved.length,
      refactoredInPlace: results.refactoredInPlace.length,
    }
    const outcome: RunOutcome = {
      runId: uuidv4(),
      status: 'no-changes',
      projectRoot: results.getProjectRoot(),
      counts,
    }

    const firstException = results.getFirstException()
    if (firstException) {
      this.log.error('The recipe produced an error. Please report this to the recipe author.', firstException)
      return { ...outcome, status: 'failed', error: firstException.message }
    }

    if (!results.isNotEmpty()) {
      this.log.info('No changes made by the active recipe(s).')
      return outcome
    }

    for (const result of results.generated) {
      this.logResult(headings.generated(result), result)
    }
    for (const result of results.deleted) {
      this.logResult(headings.deleted(result), result)
    }
    for (const result of results.moved) {
      this.logResult(headings.moved(result), result)
    }
    for (const result of results.refactoredInPlace) {
      this.logResult(headings.refactoredInPlace(result), result)
    }

    return { ...outcome, status: 'changes' }
  }

  private logResult(heading: string, result: TransformationResult): void {
    this.log.warn(heading)
    for (const line of describeRecipesThatMadeChanges(result.recipesThatMadeChanges)) {
      this.log.warn(line)
    }
  }
}
