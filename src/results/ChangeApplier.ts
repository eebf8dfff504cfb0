import { promises as fs } from 'fs'
import path from 'path'
import { InputError, SourceSnapshot } from '../contracts'
import { debugLog } from '../logging'
import { isWithin } from '../project'
import { printSnapshot, SilentMarkerPrinter } from '../tree'
import { ResultsContainer } from './ResultsContainer'

interface PlannedWrite {
  target: string
  snapshot: SourceSnapshot
}

export interface AppliedChanges {
  written: string[]
  removed: string[]
}

/**
 * Writes classified results to disk under the project root
 */
export class ChangeApplier {
  constructor(private results: ResultsContainer) {}

  async apply(): Promise<AppliedChanges> {
    const { removals, writes } = this.plan()
    const applied: AppliedChanges = { written: [], removed: [] }

    // All removals before any write; a path that is also written is never removed
    const writeTargets = new Set(writes.map(write => write.target))
    for (const target of removals) {
      if (!writeTargets.has(target)) {
        applied.removed.push(await this.remove(target))
      }
    }
    for (const { target, snapshot } of writes) {
      applied.written.push(await this.write(target, snapshot))
    }

    debugLog({ event: 'changes_applied', ...applied })
    return applied
  }

  /**
   * Resolves every target up front, so a path outside the project root fails
   * the whole apply before the first file is touched
   */
  private plan(): { removals: string[], writes: PlannedWrite[] } {
    const removals: string[] = []
    const writes: PlannedWrite[] = []

    for (const result of this.results.deleted) {
      if (result.before) {
        removals.push(this.resolve(result.before))
      }
    }
    for (const result of this.results.moved) {
      if (result.before) {
        removals.push(this.resolve(result.before))
      }
    }
    for (const result of [...this.results.generated, ...this.results.moved, ...this.results.refactoredInPlace]) {
      if (result.after) {
        writes.push({ target: this.resolve(result.after), snapshot: result.after })
      }
    }

    return { removals, writes }
  }

  private resolve(snapshot: SourceSnapshot): string {
    const root = this.results.getProjectRoot()
    const target = path.resolve(root, snapshot.sourcePath)
    if (target === root || !isWithin(target, root)) {
      throw new InputError(`Refusing to touch ${snapshot.sourcePath}: it resolves outside ${root}`)
    }
    return target
  }

  private async write(target: string, snapshot: SourceSnapshot): Promise<string> {
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, printSnapshot(snapshot, SilentMarkerPrinter), 'utf8')
    return target
  }

  private async remove(target: string): Promise<string> {
    try {
      await fs.rm(target)
    } catch (error) {
      // Already gone, or a parent is no longer a directory
      if (!isMissing(error)) {
        throw error
      }
      debugLog({ event: 'remove_missing_file', target })
    }
    return target
  }
}

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
