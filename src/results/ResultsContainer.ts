import { promises as fs } from 'fs'
import path from 'path'
import {
  CleanupError,
  CleanupFailure,
  RecipeError,
  TransformationResult,
  toError,
} from '../contracts'
import { debugLog, Log } from '../logging'
import { isWithin } from '../project'
import { findFirstMarker, visitTree } from '../tree'
import { DiffOptions, renderDiff } from './DiffRenderer'

export type ResultCategory = 'generated' | 'deleted' | 'moved' | 'refactoredInPlace'

// Order in which categories are scanned for embedded errors
export const RESULT_CATEGORIES: readonly ResultCategory[] = ['generated', 'deleted', 'moved', 'refactoredInPlace']

export interface ResultsContainerOptions {
  log?: Log
  diff?: DiffOptions
}

export class ResultsContainer {
  readonly generated: TransformationResult[] = []
  readonly deleted: TransformationResult[] = []
  readonly moved: TransformationResult[] = []
  readonly refactoredInPlace: TransformationResult[] = []

  private diffs = new Map<TransformationResult, string>()
  private diffOptions: DiffOptions

  constructor(
    readonly projectRoot: string,
    results: Iterable<TransformationResult>,
    options: ResultsContainerOptions = {}
  ) {
    this.diffOptions = options.diff ?? {}

    let index = 0
    for (const result of results) {
      const { before, after } = result

      if (!before && !after) {
        // Makes no sense coming out of an engine run; log and skip
        options.log?.debug(`Skipping result ${index}: it has neither a before nor an after source file`)
        debugLog({ event: 'degenerate_result_dropped', index })
      } else if (!before) {
        this.generated.push(result)
      } else if (!after) {
        this.deleted.push(result)
      } else if (before.sourcePath !== after.sourcePath) {
        this.moved.push(result)
      } else if (this.diff(result) !== '') {
        this.refactoredInPlace.push(result)
      }

      index++
    }

    debugLog({
      event: 'results_classified',
      projectRoot,
      generated: this.generated.length,
      deleted: this.deleted.length,
      moved: this.moved.length,
      refactoredInPlace: this.refactoredInPlace.length,
    })
  }

  getProjectRoot(): string {
    return this.projectRoot
  }

  /**
   * Diff text of a result with only search results and error markup fenced in
   */
  diff(result: TransformationResult): string {
    let text = this.diffs.get(result)
    if (text === undefined) {
      text = renderDiff(result, this.diffOptions)
      this.diffs.set(result, text)
    }
    return text
  }

  category(category: ResultCategory): TransformationResult[] {
    return this[category]
  }

  isNotEmpty(): boolean {
    return this.generated.length > 0 ||
      this.deleted.length > 0 ||
      this.moved.length > 0 ||
      this.refactoredInPlace.length > 0
  }

  getFirstException(): RecipeError | null {
    for (const category of RESULT_CATEGORIES) {
      for (const result of this[category]) {
        const [firstError] = this.getRecipeErrors(result, 1)
        if (firstError !== undefined) {
          return new RecipeError(firstError, result.after?.sourcePath ?? null)
        }
      }
    }
    return null
  }

  /**
   * Error details embedded in the after tree of a result, in pre-order
   */
  getRecipeErrors(result: TransformationResult, limit: number = Infinity): string[] {
    const errors: string[] = []
    if (!result.after) {
      return errors
    }

    visitTree(result.after.tree, node => {
      const error = findFirstMarker(node.markers, 'ErrorMarkup')
      if (error) {
        errors.push(error.detail)
        if (errors.length >= limit) {
          return 'stop'
        }
      }
    })
    return errors
  }

  /**
   * Remove directories that are empty as a result of applying recipe changes.
   * Returns the directories that were removed.
   */
  async newlyEmptyDirectories(): Promise<string[]> {
    const maybeEmptyDirectories = new Set<string>()
    for (const result of [...this.moved, ...this.deleted]) {
      if (!result.before) {
        continue
      }
      const directory = path.dirname(path.resolve(this.projectRoot, result.before.sourcePath))
      if (directory === path.resolve(this.projectRoot) || !isWithin(directory, this.projectRoot)) {
        debugLog({ event: 'empty_directory_outside_root', directory })
        continue
      }
      maybeEmptyDirectories.add(directory)
    }

    const removed: string[] = []
    const failures: CleanupFailure[] = []

    for (const directory of maybeEmptyDirectories) {
      try {
        const contents = await fs.readdir(directory)
        if (contents.length > 0) {
          continue
        }
        await fs.rmdir(directory)
        removed.push(directory)
      } catch (error) {
        if (isNotFound(error)) {
          debugLog({ event: 'empty_directory_missing', directory })
          continue
        }
        failures.push({ directory, error: toError(error) })
      }
    }

    debugLog({
      event: 'empty_directories_cleaned',
      candidates: Array.from(maybeEmptyDirectories),
      removed,
      failures: failures.map(f => f.directory),
    })

    if (failures.length > 0) {
      throw new CleanupError(failures, removed)
    }
    return removed
  }
}

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
