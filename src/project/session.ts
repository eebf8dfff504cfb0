import { BuildSession, InputError, ProjectNode } from '../contracts'
import { BuildSessionInput } from '../contracts/schemas'

/**
 * Link the flat project list of an input document into parent-pointing nodes
 */
export function buildSession(input: BuildSessionInput, localRepositoryOverride?: string): BuildSession {
  const nodes = new Map<string, ProjectNode>()
  for (const project of input.projects) {
    if (nodes.has(project.id)) {
      throw new InputError(`Duplicate project id '${project.id}'`)
    }
    nodes.set(project.id, { id: project.id, baseDir: project.baseDir, parent: null })
  }

  for (const project of input.projects) {
    if (project.parent === null) continue

    const node = nodes.get(project.id)
    const parent = nodes.get(project.parent)
    if (!node || !parent) {
      throw new InputError(`Project '${project.id}' references unknown parent '${project.parent}'`)
    }
    node.parent = parent
  }

  return {
    projects: Array.from(nodes.values()),
    localRepository: localRepositoryOverride ?? input.localRepository,
    executionRoot: input.executionRoot,
  }
}
