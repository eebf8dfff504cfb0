import {
  BuildSession,
  RecipeDescriptor,
  RecipeValidationError,
  ReconcileConfig,
  TransformationResult,
} from '../contracts'
import { debugLog, Log } from '../logging'
import { locateRepositoryRoot, resolveBuildRoot } from '../project'
import { findRecipeDescriptor, RecipeEngine } from '../recipes'
import { ResultsContainer } from '../results'
import { findFirstMarker } from '../tree'

export interface ListResultsDeps {
  session: BuildSession
  engine: RecipeEngine
  config: ReconcileConfig
  activeRecipes: string[]
  log: Log
  repositoryRoot?: (buildRoot: string) => string
}

/**
 * Resolve where the build lives, run the active recipes and classify what
 * they changed
 */
export async function listResults(deps: ListResultsDeps): Promise<ResultsContainer> {
  const { session, engine, config, activeRecipes, log } = deps
  const containerOptions = { log, diff: { contextLines: config.diff.contextLines } }

  const buildRoot = resolveBuildRoot(session)
  const repositoryRoot = (deps.repositoryRoot ?? locateRepositoryRoot)(buildRoot)

  log.info(`Using active recipe(s) [${activeRecipes.join(', ')}]`)
  if (activeRecipes.length === 0) {
    log.warn(
      'No recipes were activated. Activate a recipe with "activeRecipes" in .reconcile.config.json ' +
      'or in the input document.'
    )
    return new ResultsContainer(repositoryRoot, [], containerOptions)
  }

  log.info('Validating active recipes...')
  const recipes = validateActiveRecipes(activeRecipes, engine.availableRecipes(), config, log)

  log.info('Running recipe(s)...')
  const results = (await engine.run(recipes, repositoryRoot)).filter(isNotGeneratedSource)

  debugLog({
    event: 'results_listed',
    buildRoot,
    repositoryRoot,
    activeRecipes,
    resultCount: results.length,
  })

  return new ResultsContainer(repositoryRoot, results, containerOptions)
}

function validateActiveRecipes(
  activeRecipes: string[],
  available: RecipeDescriptor[],
  config: ReconcileConfig,
  log: Log
): RecipeDescriptor[] {
  const recipes: RecipeDescriptor[] = []
  const failures: string[] = []

  for (const name of activeRecipes) {
    try {
      recipes.push(findRecipeDescriptor(name, available))
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      failures.push(message)
      log.error(`Recipe validation error in ${name}: ${message}`)
    }
  }

  if (failures.length > 0) {
    if (config.failOnInvalidActiveRecipes) {
      throw new RecipeValidationError(failures)
    }
    log.error('Recipe validation errors detected as part of one or more activeRecipe(s). Execution will continue regardless.')
  }

  return recipes
}

// Sources generated by the build itself are not reported
const isNotGeneratedSource = (result: TransformationResult): boolean =>
  !result.before || findFirstMarker(result.before.tree.markers, 'Generated') === undefined
