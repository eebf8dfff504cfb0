import { InputError, RecipeDescriptor, TransformationResult } from '../contracts'
import { ReconcileInput, TransformationResultInput } from '../contracts/schemas'
import { normalizeTree } from '../tree'
import { RecipeEngine } from './RecipeEngine'
import { findRecipeDescriptor, toRecipeDescriptor } from './RecipeCatalog'

/**
 * Replays results an engine run already produced, as read from an input
 * document
 */
export class RecordedRecipeEngine implements RecipeEngine {
  private catalog: RecipeDescriptor[]
  private results: TransformationResult[]

  constructor(input: Pick<ReconcileInput, 'recipes' | 'results'>) {
    this.catalog = input.recipes.map(toRecipeDescriptor)
    this.results = input.results.map((result, index) => this.toResult(result, index))
  }

  availableRecipes(): RecipeDescriptor[] {
    return this.catalog
  }

  async run(): Promise<TransformationResult[]> {
    return this.results
  }

  private toResult(input: TransformationResultInput, index: number): TransformationResult {
    const recipesThatMadeChanges = input.recipes.map(name => {
      try {
        return findRecipeDescriptor(name, this.catalog)
      } catch (error) {
        throw new InputError(`Result ${index} names a recipe missing from the catalog: ${name}`, { cause: error })
      }
    })

    return {
      before: input.before ? { sourcePath: input.before.sourcePath, tree: normalizeTree(input.before.tree) } : null,
      after: input.after ? { sourcePath: input.after.sourcePath, tree: normalizeTree(input.after.tree) } : null,
      recipesThatMadeChanges,
    }
  }
}
