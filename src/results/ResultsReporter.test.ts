import { describe, it, expect, beforeEach } from 'vitest'
import { ResultsReporter } from './ResultsReporter'
import { ResultsContainer } from './ResultsContainer'
import { MemoryLog } from '../logging'
import { errorMarkup, recipe, result, snapshot } from '../../test/helpers/results'

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe('ResultsReporter', () => {
  let log: MemoryLog

  beforeEach(() => {
    log = new MemoryLog()
  })

  const addFile = recipe('org.example.AddFile', [
    { name: 'fileName', value: 'New.ts' },
    { name: 'overwrite', value: null },
  ])
  const cleanup = recipe('org.example.Cleanup', [], [recipe('org.example.RemoveUnusedImports')])

  const container = () => new ResultsContainer('/repo', [
    result(null, snapshot('src/New.ts', 'class New {}\n'), [addFile]),
    result(snapshot('src/Gone.ts', 'x\n'), null, [cleanup]),
    result(snapshot('src/Old.ts', 'x\n'), snapshot('src/Moved.ts', 'x\n'), [cleanup]),
    result(snapshot('src/A.ts', 'a\n'), snapshot('src/A.ts', 'b\n'), [cleanup, addFile]),
  ])

  it('should log each result with the recipes that changed it', () => {
    const outcome = new ResultsReporter(log, 'run').report(container())

    expect(log.messages('warn')).toEqual([
      'Generated new file src/New.ts by:',
      '    org.example.AddFile: {fileName=New.ts}',
      'Deleted file src/Gone.ts by:',
      '    org.example.Cleanup',
      '        org.example.RemoveUnusedImports',
      'File has been moved from src/Old.ts to src/Moved.ts by:',
      '    org.example.Cleanup',
      '        org.example.RemoveUnusedImports',
      'Changes have been made to src/A.ts by:',
      '    org.example.Cleanup',
      '        org.example.RemoveUnusedImports',
      '        org.example.AddFile: {fileName=New.ts}',
    ])
    expect(outcome.status).toBe('changes')
    expect(outcome.counts).toEqual({ generated: 1, deleted: 1, moved: 1, refactoredInPlace: 1 })
    expect(outcome.projectRoot).toBe('/repo')
    expect(outcome.runId).toMatch(UUID_PATTERN)
  })

  it('should word a dry run as what would happen', () => {
    new ResultsReporter(log, 'dry-run').report(new ResultsContainer('/repo', [
      result(snapshot('src/Old.ts', 'x\n'), snapshot('src/Moved.ts', 'x\n')),
    ]))

    expect(log.messages('warn')).toEqual([
      'These recipes would move file from src/Old.ts to src/Moved.ts:',
    ])
  })

  it('should report a run without changes as successful', () => {
    const outcome = new ResultsReporter(log, 'run').report(new ResultsContainer('/repo', []))

    expect(outcome.status).toBe('no-changes')
    expect(outcome.error).toBeUndefined()
    expect(log.messages('info')).toEqual(['No changes made by the active recipe(s).'])
  })

  it('should fail the run when a recipe embedded an error', () => {
    const outcome = new ResultsReporter(log, 'run').report(new ResultsContainer('/repo', [
      result(snapshot('src/A.ts', 'a\n'), snapshot('src/A.ts', 'a\n', [errorMarkup('e1', 'Recipe crashed')])),
    ]))

    expect(outcome.status).toBe('failed')
    expect(outcome.error).toBe('Recipe crashed')
    expect(log.messages('error')).toEqual(['The recipe produced an error. Please report this to the recipe author.'])
    expect(log.entries.find(e => e.level === 'error')?.error?.message).toBe('Recipe crashed')
    expect(log.messages('warn')).toEqual([])
  })
})
