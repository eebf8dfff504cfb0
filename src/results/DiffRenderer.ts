import { createTwoFilesPatch } from 'diff'
import { TransformationResult } from '../contracts'
import { FencedMarkerPrinter, MarkerPrinter, printSnapshot } from '../tree'

export interface DiffOptions {
  markerPrinter?: MarkerPrinter
  contextLines?: number
}

const DEV_NULL = '/dev/null'

/**
 * Unified diff between the printed before and after trees of a result.
 * Empty when the file keeps its path and prints identically.
 */
export function renderDiff(result: TransformationResult, options: DiffOptions = {}): string {
  const markerPrinter = options.markerPrinter ?? FencedMarkerPrinter
  const { before, after } = result

  const beforeText = before ? printSnapshot(before, markerPrinter) : ''
  const afterText = after ? printSnapshot(after, markerPrinter) : ''

  if (before && after && before.sourcePath === after.sourcePath && beforeText === afterText) {
    return ''
  }
  if (!before && !after) {
    return ''
  }

  return createTwoFilesPatch(
    before ? `a/${before.sourcePath}` : DEV_NULL,
    after ? `b/${after.sourcePath}` : DEV_NULL,
    beforeText,
    afterText,
    undefined,
    undefined,
    { context: options.contextLines ?? 3 }
  )
}
