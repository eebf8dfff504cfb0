import { promises as fs } from 'fs'
import path from 'path'
import { RESULT_CATEGORIES, ResultsContainer } from './ResultsContainer'

export const PATCH_FILE_NAME = 'rewrite.patch'

/**
 * Concatenated diffs of every classified result, in category order
 */
export function buildPatch(results: ResultsContainer): string {
  let patch = ''
  for (const category of RESULT_CATEGORIES) {
    for (const result of results.category(category)) {
      patch += results.diff(result)
    }
  }
  return patch
}

export async function writePatch(results: ResultsContainer, outputDirectory: string): Promise<string> {
  const directory = path.resolve(results.getProjectRoot(), outputDirectory)
  const patchFile = path.join(directory, PATCH_FILE_NAME)

  await fs.mkdir(directory, { recursive: true })
  await fs.writeFile(patchFile, buildPatch(results), 'utf8')
  return patchFile
}
