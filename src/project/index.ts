export { BaseDirectoryResolver, resolveBuildRoot } from './BaseDirectoryResolver'
export { locateRepositoryRoot, VCS_MARKER, ExistsCheck } from './RepositoryRootLocator'
export { buildSession } from './session'
export { isWithin } from './paths'
