import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs'
import path from 'path'
import os from 'os'
import { parseArgs, run } from './run'
import type { RunDependencies } from './run'
import { MemorySnapshotWriter } from '../output/MemorySnapshotWriter'
import { SnapshotRootError } from '../errors'
import { FakeVcsRunner, writeTree } from '../../test/helpers'

describe('projsnap cli', () => {
  describe('parseArgs', () => {
    it('should default to the working directory and no mode', () => {
      expect(parseArgs([], '/work')).toEqual({ rootDir: '/work', help: false })
    })

    it('should parse root, mode and config', () => {
      expect(parseArgs(['proj', '--mode', 'diff', '-c', 'snap.json'], '/work')).toEqual({
        rootDir: path.resolve('/work', 'proj'),
        mode: 'diff',
        configPath: path.resolve('/work', 'snap.json'),
        help: false,
      })
    })

    it('should recognise help', () => {
      expect(parseArgs(['--help'], '/work').help).toBe(true)
    })

    it('should reject bad arguments', () => {
      expect(() => parseArgs(['--bogus'], '/work')).toThrow('Unknown option: --bogus')
      expect(() => parseArgs(['--mode'], '/work')).toThrow('Missing value for --mode')
      expect(() => parseArgs(['a', 'b'], '/work')).toThrow('Unexpected argument: b')
    })
  })

  describe('run', () => {
    let tempDir: string
    let writer: MemorySnapshotWriter
    let printed: string[]
    let deps: RunDependencies

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'))
      writeTree(tempDir, { 'src/app.ts': 'console.log(1)\n', 'notes.md': 'todo\n' })
      writer = new MemorySnapshotWriter()
      printed = []
      deps = {
        writer,
        assembler: { vcsRunner: FakeVcsRunner.withLines('?? notes.md'), resolveSelfPath: () => null },
        now: () => new Date(2024, 2, 4, 5, 6, 7),
        print: (line) => printed.push(line),
      }
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('should ask for a mode and write JSON and TXT outputs', async () => {
      const prompt = vi.fn(async () => '1')

      const result = await run({ rootDir: tempDir, help: false }, { ...deps, prompt })

      expect(prompt).toHaveBeenCalledWith('Choose mode [1/2/3]: ')
      expect(printed.slice(0, 4)).toEqual([
        '\n📂 Project Snapshot Menu',
        '1. All (full project contents: folders, files, code)',
        '2. Git diff (only changes, with full contents)',
        '3. Minimal (structure + metadata only)',
      ])
      expect(result.command).toBe('all')
      expect(result.outputs).toEqual(['snapshot-20240304-050607.json', 'snapshot-20240304-050607.txt'])
      expect(printed.slice(-2)).toEqual([
        '✅ Snapshot saved to snapshot-20240304-050607.json',
        '✅ Snapshot saved to snapshot-20240304-050607.txt',
      ])
      expect(writer.get('snapshot-20240304-050607.txt')).toContain('console.log(1)\n')
    })

    it('should use the mode option without prompting', async () => {
      const prompt = vi.fn(async () => '1')

      const result = await run({ rootDir: tempDir, mode: 'diff', help: false }, { ...deps, prompt })

      expect(prompt).not.toHaveBeenCalled()
      expect(result.command).toBe('diff')
      expect(result.snapshot.files.map((file) => [file.relativePath, file.vcsStatus, file.content])).toEqual([
        ['notes.md', 'Untracked', 'todo\n'],
        ['src/app.ts', 'Clean', null],
      ])

      const json = writer.get('snapshot-20240304-050607.json')
      expect(json === null ? null : JSON.parse(json)).toEqual(result.snapshot)
      expect(writer.get('snapshot-20240304-050607.txt')).not.toContain('FILE CONTENT')
    })

    it('should fall back to minimal on an unknown choice', async () => {
      const result = await run({ rootDir: tempDir, help: false }, { ...deps, prompt: async () => '9' })

      expect(printed).toContain('Invalid choice, defaulting to minimal.')
      expect(result.command).toBe('minimal')
      expect(result.snapshot.files.every((file) => file.content === null)).toBe(true)
    })

    it('should write nothing when the root is missing', async () => {
      const missing = path.join(tempDir, 'missing')

      await expect(run({ rootDir: missing, mode: 'all', help: false }, deps)).rejects.toBeInstanceOf(SnapshotRootError)
      expect(writer.names()).toEqual([])
    })
  })
})
