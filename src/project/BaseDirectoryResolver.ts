import { BuildRootResolutionError, BuildSession, ProjectNode } from '../contracts'
import { debugLog } from '../logging'
import { comparePaths, isWithin, normalizeDir } from './paths'

export class BaseDirectoryResolver {
  private localRepository: string

  constructor(private session: BuildSession) {
    this.localRepository = normalizeDir(session.localRepository)
  }

  /**
   * Distinct base directories of every module and its ancestors, excluding
   * anything inside the local artifact cache
   */
  collectBaseDirectories(): Set<string> {
    const baseDirs = new Set<string>()
    const visited = new Set<ProjectNode>()

    for (const project of this.session.projects) {
      let current: ProjectNode | null = project
      while (current && !visited.has(current)) {
        visited.add(current)

        if (current.baseDir !== null) {
          const baseDir = normalizeDir(current.baseDir)
          if (!isWithin(baseDir, this.localRepository)) {
            baseDirs.add(baseDir)
          }
        }

        current = current.parent
      }
    }

    return baseDirs
  }

  /**
   * The canonical root of the build: the first collected base directory in
   * path-string order, or the execution root when no module has one
   */
  resolveBuildRoot(): string {
    const baseDirs = this.collectBaseDirectories()

    if (baseDirs.size > 0) {
      const sorted = Array.from(baseDirs).sort(comparePaths)
      debugLog({
        event: 'build_root_resolved',
        candidates: sorted,
        buildRoot: sorted[0],
      })
      return sorted[0]
    }

    if (this.session.executionRoot) {
      debugLog({
        event: 'build_root_fallback',
        executionRoot: this.session.executionRoot,
      })
      return normalizeDir(this.session.executionRoot)
    }

    throw new BuildRootResolutionError(
      'Unable to determine the build root: no module has a base directory outside ' +
      `${this.localRepository} and the session has no execution root`
    )
  }
}

export const resolveBuildRoot = (session: BuildSession): string =>
  new BaseDirectoryResolver(session).resolveBuildRoot()
