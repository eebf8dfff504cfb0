import { RecipeDescriptor, RecipeNotFoundError } from '../contracts'
import { RecipeDescriptorInput } from '../contracts/schemas'

export function toRecipeDescriptor(input: RecipeDescriptorInput): RecipeDescriptor {
  return {
    name: input.name,
    displayName: input.displayName,
    options: input.options ?? [],
    recipeList: (input.recipeList ?? []).map(toRecipeDescriptor),
  }
}

/**
 * Case-insensitive lookup of a recipe by its fully qualified name
 */
export function findRecipeDescriptor(recipe: string, descriptors: RecipeDescriptor[]): RecipeDescriptor {
  const wanted = recipe.toLowerCase()
  const found = descriptors.find(descriptor => descriptor.name.toLowerCase() === wanted)
  if (!found) {
    throw new RecipeNotFoundError(recipe)
  }
  return found
}

/**
 * Render a recipe and its sub-recipes, one per line, each level indented by
 * four more spaces than its parent
 */
export function describeRecipeTree(descriptor: RecipeDescriptor, prefix: string = '    '): string[] {
  let line = prefix + descriptor.name

  const options = descriptor.options
    .filter(option => option.value !== null)
    .map(option => `${option.name}=${option.value}`)
    .join(', ')
  if (options) {
    line += `: {${options}}`
  }

  const lines = [line]
  for (const child of descriptor.recipeList) {
    lines.push(...describeRecipeTree(child, prefix + '    '))
  }
  return lines
}

/**
 * Lines describing the recipes that produced one result. Each top-level
 * recipe is nested one level deeper than the one before it.
 */
export function describeRecipesThatMadeChanges(descriptors: RecipeDescriptor[]): string[] {
  const indent = '    '
  let prefix = '    '
  const lines: string[] = []
  for (const descriptor of descriptors) {
    lines.push(...describeRecipeTree(descriptor, prefix))
    prefix = prefix + indent
  }
  return lines
}
