export class BuildRootResolutionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BuildRootResolutionError'
  }
}

/**
 * An error the recipe engine embedded in a transformed tree
 */
export class RecipeError extends Error {
  constructor(readonly detail: string, readonly sourcePath: string | null = null) {
    super(detail)
    this.name = 'RecipeError'
  }
}

export class RecipeNotFoundError extends Error {
  constructor(readonly recipe: string) {
    super(`Could not find recipe '${recipe}' among available recipes`)
    this.name = 'RecipeNotFoundError'
  }
}

export class RecipeValidationError extends Error {
  constructor(readonly failures: string[]) {
    super('Recipe validation errors detected as part of one or more activeRecipe(s). Please check error logs.')
    this.name = 'RecipeValidationError'
  }
}

export interface CleanupFailure {
  directory: string
  error: Error
}

/**
 * Raised after every candidate directory has been attempted, when at least one
 * could not be listed or removed
 */
export class CleanupError extends Error {
  constructor(readonly failures: CleanupFailure[], readonly removed: string[]) {
    super(
      `Unable to clean up ${failures.length} empty ${failures.length === 1 ? 'directory' : 'directories'}: ` +
      failures.map(f => `${f.directory} (${f.error.message})`).join(', '),
      { cause: failures[0]?.error }
    )
    this.name = 'CleanupError'
  }
}

export class InputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'InputError'
  }
}

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error))
