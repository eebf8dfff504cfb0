import { describe, it, expect } from 'vitest'
import { renderDiff } from './DiffRenderer'
import { SilentMarkerPrinter } from '../tree'
import { errorMarkup, other, result, searchResult, snapshot } from '../../test/helpers/results'

describe('renderDiff', () => {
  it('should be empty when a file is unchanged', () => {
    const diff = renderDiff(result(
      snapshot('src/A.ts', 'class A {}\n'),
      snapshot('src/A.ts', 'class A {}\n'),
    ))

    expect(diff).toBe('')
  })

  it('should ignore engine-internal markers', () => {
    const diff = renderDiff(result(
      snapshot('src/A.ts', 'class A {}\n'),
      snapshot('src/A.ts', 'class A {}\n', [other('internal-7')]),
    ))

    expect(diff).toBe('')
  })

  it('should fence search results and drop other markers', () => {
    const diff = renderDiff(result(
      snapshot('src/A.ts', 'value = 1\n'),
      snapshot('src/A.ts', 'value = 1\n', [searchResult('X'), other('internal-7')]),
    ))

    expect(diff).toContain('+{{X}}value = 1')
    expect(diff).not.toContain('internal-7')
  })

  it('should fence error markup', () => {
    const diff = renderDiff(result(
      snapshot('src/A.ts', 'value = 1\n'),
      snapshot('src/A.ts', 'value = 1\n', [errorMarkup('err-1', 'NullPointerException')]),
    ))

    expect(diff).toContain('{{err-1}}')
    expect(diff).not.toContain('NullPointerException')
  })

  it('should show changed lines', () => {
    const diff = renderDiff(result(
      snapshot('src/A.ts', 'a\nb\n'),
      snapshot('src/A.ts', 'a\nc\n'),
    ))

    expect(diff).toContain('--- a/src/A.ts')
    expect(diff).toContain('+++ b/src/A.ts')
    expect(diff).toContain('-b\n+c')
  })

  it('should describe a move even when the content is unchanged', () => {
    const diff = renderDiff(result(
      snapshot('src/Old.ts', 'class A {}\n'),
      snapshot('src/New.ts', 'class A {}\n'),
    ))

    expect(diff).toContain('--- a/src/Old.ts')
    expect(diff).toContain('+++ b/src/New.ts')
  })

  it('should diff new files against /dev/null', () => {
    const diff = renderDiff(result(null, snapshot('src/New.ts', 'created\n')))

    expect(diff).toContain('--- /dev/null')
    expect(diff).toContain('+++ b/src/New.ts')
    expect(diff).toContain('+created')
  })

  it('should diff deleted files against /dev/null', () => {
    const diff = renderDiff(result(snapshot('src/Gone.ts', 'removed\n'), null))

    expect(diff).toContain('--- a/src/Gone.ts')
    expect(diff).toContain('+++ /dev/null')
    expect(diff).toContain('-removed')
  })

  it('should honor the number of context lines', () => {
    const lines = Array.from({ length: 10 }, (_, i) => `line${i + 1}`)
    const before = snapshot('f.txt', lines.join('\n') + '\n')
    const after = snapshot('f.txt', [...lines.slice(0, 9), 'LINE10'].join('\n') + '\n')

    expect(renderDiff(result(before, after), { contextLines: 3 })).toContain(' line9\n')
    expect(renderDiff(result(before, after), { contextLines: 0 })).not.toContain(' line9\n')
  })

  it('should accept another marker printer', () => {
    const diff = renderDiff(result(
      snapshot('src/A.ts', 'value = 1\n'),
      snapshot('src/A.ts', 'value = 1\n', [searchResult('X')]),
    ), { markerPrinter: SilentMarkerPrinter })

    expect(diff).toBe('')
  })
})
