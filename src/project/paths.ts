import path from 'path'

/**
 * True when `candidate` equals `parent` or lies beneath it. Compares whole path
 * segments, so /cache-old is not inside /cache.
 */
export function isWithin(candidate: string, parent: string): boolean {
  const relative = path.relative(parent, candidate)
  if (relative === '') return true
  if (path.isAbsolute(relative)) return false
  return relative.split(path.sep)[0] !== '..'
}

export const normalizeDir = (dir: string): string => path.resolve(dir)

// Plain code-unit order; no locale collation or case folding
export const comparePaths = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)
