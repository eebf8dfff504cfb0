// Markers attached to tree nodes by the recipe engine
export interface SearchResultMarker {
  kind: 'SearchResult'
  id: string
  description?: string
}

export interface ErrorMarkupMarker {
  kind: 'ErrorMarkup'
  id: string
  detail: string
}

export interface GeneratedMarker {
  kind: 'Generated'
  id: string
}

export interface OtherMarker {
  kind: 'Other'
  id: string
  name?: string
}

export type Marker = SearchResultMarker | ErrorMarkupMarker | GeneratedMarker | OtherMarker

export type MarkerKind = Marker['kind']

export interface TreeNode {
  prefix: string
  text: string
  markers: Marker[]
  children: TreeNode[]
}

export interface SourceSnapshot {
  // Relative to the project root
  sourcePath: string
  tree: TreeNode
}

export interface RecipeOption {
  name: string
  value: string | number | boolean | null
}

export interface RecipeDescriptor {
  name: string
  displayName?: string
  options: RecipeOption[]
  recipeList: RecipeDescriptor[]
}

export interface TransformationResult {
  before: SourceSnapshot | null
  after: SourceSnapshot | null
  recipesThatMadeChanges: RecipeDescriptor[]
}

export interface ProjectNode {
  id: string
  baseDir: string | null
  parent: ProjectNode | null
}

export interface BuildSession {
  projects: ProjectNode[]
  // Shared local artifact cache, e.g. ~/.m2/repository
  localRepository: string
  executionRoot: string | null
}

export interface ReconcileConfig {
  activeRecipes: string[]
  localRepository?: string
  failOnInvalidActiveRecipes: boolean
  cleanEmptyDirectories: boolean
  reportOutputDirectory: string
  diff: {
    contextLines: number
  }
}

export type RunStatus = 'no-changes' | 'changes' | 'failed'

export interface RunOutcome {
  runId: string
  status: RunStatus
  projectRoot: string
  counts: {
    generated: number
    deleted: number
    moved: number
    refactoredInPlace: number
  }
  error?: string
}

export interface CommandOutcome {
  exitCode: 0 | 1
  output: string
  warnings: string[]
}
