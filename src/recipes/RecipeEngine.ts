import { RecipeDescriptor, TransformationResult } from '../contracts'

/**
 * The transformation engine that parses sources and runs recipes over them.
 * Returns every before/after pair the run produced.
 */
export interface RecipeEngine {
  availableRecipes(): RecipeDescriptor[]
  run(activeRecipes: RecipeDescriptor[], projectRoot: string): Promise<TransformationResult[]>
}
