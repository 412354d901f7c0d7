import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import path from 'path'
import os from 'os'
import { AllCommand, CommandRegistry, DiffCommand, MinimalCommand, defaultCommands } from './index'
import { SnapshotAssembler } from '../snapshot/SnapshotAssembler'
import { ConfigLoader } from '../config/ConfigLoader'
import { FakeVcsRunner, writeTree } from '../../test/helpers'

describe('Commands', () => {
  describe('CommandRegistry', () => {
    let registry: CommandRegistry

    beforeEach(() => {
      registry = CommandRegistry.createWithDefaults(defaultCommands)
    })

    it('should resolve names, aliases and menu numbers case-insensitively', () => {
      expect(registry.get('all')).toBe(AllCommand)
      expect(registry.get('1')).toBe(AllCommand)
      expect(registry.get('FULL')).toBe(AllCommand)
      expect(registry.get(' 2 ')).toBe(DiffCommand)
      expect(registry.get('git-diff')).toBe(DiffCommand)
      expect(registry.get('3')).toBe(MinimalCommand)
      expect(registry.get('4')).toBeUndefined()
    })

    it('should list each command once', () => {
      expect(registry.getAll()).toEqual([AllCommand, DiffCommand, MinimalCommand])
    })

    it('should build the mode menu', () => {
      expect(registry.menu()).toEqual([
        '1. All (full project contents: folders, files, code)',
        '2. Git diff (only changes, with full contents)',
        '3. Minimal (structure + metadata only)',
      ])
    })
  })

  describe('execute', () => {
    let tempDir: string
    let assembler: SnapshotAssembler

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'commands-test-'))
      writeTree(tempDir, { 'a.ts': 'const a = 1', 'b.ts': 'const b = 2' })
      assembler = new SnapshotAssembler(tempDir, ConfigLoader.defaults(), {
        vcsRunner: FakeVcsRunner.withLines(' M b.ts'),
        resolveSelfPath: () => null,
      })
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('should collect a full snapshot with printed contents', async () => {
      const result = await AllCommand.execute(assembler, [])

      expect(result.printContents).toBe(true)
      expect(result.snapshot.mode).toBe('full')
      expect(result.snapshot.files.map((file) => file.content)).toEqual(['const a = 1', 'const b = 2'])
    })

    it('should collect a diff snapshot', async () => {
      const result = await DiffCommand.execute(assembler, [])

      expect(result.printContents).toBe(false)
      expect(result.snapshot.files.map((file) => file.content)).toEqual([null, 'const b = 2'])
    })

    it('should collect a minimal snapshot', async () => {
      const result = await MinimalCommand.execute(assembler, [])

      expect(result.printContents).toBe(false)
      expect(result.snapshot.mode).toBe('minimal')
      expect(result.snapshot.files.every((file) => file.content === null)).toBe(true)
    })
  })
})
