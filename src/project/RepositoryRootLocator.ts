import fs from 'fs'
import path from 'path'
import { debugLog } from '../logging'

export const VCS_MARKER = '.git'

export type ExistsCheck = (filePath: string) => boolean

/**
 * Attempt to determine the root of the git repository containing the build.
 * Many builds co-locate the build root with the repository root, but that is
 * not required. When no repository is found the build root is returned.
 */
export function locateRepositoryRoot(buildRoot: string, exists: ExistsCheck = fs.existsSync): string {
  let current = path.resolve(buildRoot)

  while (true) {
    if (exists(path.join(current, VCS_MARKER))) {
      debugLog({ event: 'repository_root_found', buildRoot, repositoryRoot: current })
      return current
    }

    const parent = path.dirname(current)
    if (parent === current) {
      break
    }
    current = parent
  }

  debugLog({ event: 'repository_root_not_found', buildRoot })
  return buildRoot
}
