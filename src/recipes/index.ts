export {
  toRecipeDescriptor,
  findRecipeDescriptor,
  describeRecipeTree,
  describeRecipesThatMadeChanges,
} from './RecipeCatalog'
export { RecipeEngine } from './RecipeEngine'
export { RecordedRecipeEngine } from './RecordedRecipeEngine'
