import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Command, CommandRegistry, createDefaultRegistry, DryRunCommand, RootCommand, RunCommand } from './index'
import { ConfigLoader } from '../config/ConfigLoader'
import { ReconcileInput, ReconcileInputSchema } from '../contracts'
import { MemoryLog } from '../logging'
import { ReconcileContext } from '../reconcile'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('commands', () => {
  let tempDir: string
  let log: MemoryLog

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'commands-test-'))
    log = new MemoryLog()
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  const inputWith = (results: unknown[]): ReconcileInput => ReconcileInputSchema.parse({
    session: {
      localRepository: path.join(tempDir, '.m2'),
      projects: [
        { id: 'root', baseDir: tempDir },
        { id: 'app', baseDir: path.join(tempDir, 'app'), parent: 'root' },
      ],
    },
    activeRecipes: ['org.example.Cleanup'],
    recipes: [{ name: 'org.example.Cleanup' }],
    results,
  })

  const context = (input: ReconcileInput, configPath = '/non/existent/path.json'): ReconcileContext => ({
    readInput: async () => input,
    configLoader: new ConfigLoader(configPath),
    log,
    repositoryRoot: (buildRoot) => buildRoot,
  })

  describe('registry', () => {
    it('should resolve commands by name and alias', () => {
      const registry = createDefaultRegistry()

      expect(registry.get('RUN')).toBe(RunCommand)
      expect(registry.get('apply')).toBe(RunCommand)
      expect(registry.get('check')).toBe(DryRunCommand)
      expect(registry.get('unknown')).toBeUndefined()
      expect(registry.getAll().map(c => c.name)).toEqual(['root', 'dry-run', 'run', 'help'])
    })

    it('should reject a name or alias that is already registered', () => {
      const registry = new CommandRegistry([RunCommand])
      const clash: Command = { ...RootCommand, name: 'status', aliases: ['Apply'] }

      expect(() => registry.register(clash))
        .toThrow("Cannot register command 'status': 'apply' is already taken by 'run'")
      expect(registry.get('status')).toBeUndefined()
      expect(registry.getAll()).toEqual([RunCommand])
    })

    it('should reject a command whose aliases repeat its name', () => {
      const registry = new CommandRegistry()
      const repeated: Command = { ...RootCommand, aliases: ['ROOT'] }

      expect(() => registry.register(repeated))
        .toThrow("Cannot register command 'root': its name and aliases repeat")
      expect(registry.getAll()).toEqual([])
    })

    it('should list commands in help', async () => {
      const help = createDefaultRegistry().get('help')
      const outcome = await help?.execute(context(inputWith([])), [])

      expect(outcome?.exitCode).toBe(0)
      expect(outcome?.output).toContain('   run (apply) - Apply what the active recipes changed and remove directories left empty\n')
    })
  })

  describe('root', () => {
    it('should print the build root and repository root', async () => {
      const outcome = await RootCommand.execute(context(inputWith([])), [])

      expect(outcome.output).toBe(`Build root: ${tempDir}\nRepository root: ${tempDir}`)
    })
  })

  describe('dry-run', () => {
    it('should write a patch without touching sources', async () => {
      fs.writeFileSync(path.join(tempDir, 'A.txt'), 'old\n')
      const input = inputWith([{
        before: { sourcePath: 'A.txt', tree: { text: 'old\n' } },
        after: { sourcePath: 'A.txt', tree: { text: 'new\n' } },
        recipes: ['org.example.Cleanup'],
      }])

      const outcome = await DryRunCommand.execute(context(input), [])
      const patchFile = path.join(tempDir, 'target', 'rewrite', 'rewrite.patch')

      expect(outcome.exitCode).toBe(0)
      expect(outcome.output).toContain(`   Patch: ${patchFile}`)
      expect(fs.readFileSync(patchFile, 'utf8')).toContain('-old\n+new')
      expect(fs.readFileSync(path.join(tempDir, 'A.txt'), 'utf8')).toBe('old\n')
      expect(log.messages('warn')).toContain('These recipes would make changes to A.txt:')
    })

    it('should not write a patch when nothing changed', async () => {
      const outcome = await DryRunCommand.execute(context(inputWith([])), [])

      expect(outcome.exitCode).toBe(0)
      expect(outcome.output).toContain(': no-changes')
      expect(fs.existsSync(path.join(tempDir, 'target'))).toBe(false)
    })
  })

  describe('run', () => {
    it('should apply changes and remove directories left empty', async () => {
      fs.mkdirSync(path.join(tempDir, 'legacy'))
      fs.writeFileSync(path.join(tempDir, 'legacy', 'Old.ts'), 'class Old {}')
      const input = inputWith([
        { before: { sourcePath: 'legacy/Old.ts', tree: { text: 'class Old {}' } }, recipes: ['org.example.Cleanup'] },
        { after: { sourcePath: 'src/New.ts', tree: { text: 'class New {}' } }, recipes: ['org.example.Cleanup'] },
      ])

      const outcome = await RunCommand.execute(context(input), [])

      expect(outcome.exitCode).toBe(0)
      expect(outcome.warnings).toEqual([])
      expect(outcome.output).toContain('   Files written: 1')
      expect(outcome.output).toContain('   Files removed: 1')
      expect(outcome.output).toContain('   Empty directories removed: 1')
      expect(fs.existsSync(path.join(tempDir, 'legacy'))).toBe(false)
      expect(fs.readFileSync(path.join(tempDir, 'src', 'New.ts'), 'utf8')).toBe('class New {}')
      expect(log.messages('info')).toContain(`Removed empty directory ${path.join(tempDir, 'legacy')}`)
    })

    it('should leave empty directories when cleanup is disabled', async () => {
      const configPath = path.join(tempDir, 'reconcile.config.json')
      fs.writeFileSync(configPath, JSON.stringify({ cleanEmptyDirectories: false }))
      fs.mkdirSync(path.join(tempDir, 'legacy'))
      fs.writeFileSync(path.join(tempDir, 'legacy', 'Old.ts'), 'class Old {}')
      const input = inputWith([
        { before: { sourcePath: 'legacy/Old.ts', tree: { text: 'class Old {}' } } },
      ])

      const outcome = await RunCommand.execute(context(input, configPath), [])

      expect(outcome.output).not.toContain('Empty directories removed')
      expect(fs.existsSync(path.join(tempDir, 'legacy'))).toBe(true)
    })

    it('should fail without writing anything when a recipe embedded an error', async () => {
      const input = inputWith([{
        after: {
          sourcePath: 'src/New.ts',
          tree: { text: 'class New {}', markers: [{ kind: 'ErrorMarkup', id: 'e1', detail: 'Template failed to render' }] },
        },
      }])

      const outcome = await RunCommand.execute(context(input), [])

      expect(outcome.exitCode).toBe(1)
      expect(outcome.output).toContain('   Error: Template failed to render')
      expect(fs.existsSync(path.join(tempDir, 'src'))).toBe(false)
    })

    it('should report cleanup failures as warnings', async () => {
      // A file standing where the deleted file's directory should be
      fs.writeFileSync(path.join(tempDir, 'blocker'), 'not a directory')
      const input = inputWith([
        { before: { sourcePath: 'blocker/Old.ts', tree: { text: 'x' } } },
      ])

      const outcome = await RunCommand.execute(context(input), [])

      expect(outcome.exitCode).toBe(0)
      expect(outcome.warnings).toHaveLength(1)
      expect(outcome.warnings[0]).toMatch(/^Unable to clean up 1 empty directory: /)
      expect(outcome.output).toContain('   Empty directories removed: 0')
    })
  })
})
