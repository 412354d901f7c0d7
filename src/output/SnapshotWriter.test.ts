import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import path from 'path'
import os from 'os'
import { snapshotFileName } from './SnapshotWriter'
import { FileSnapshotWriter } from './FileSnapshotWriter'
import { MemorySnapshotWriter } from './MemorySnapshotWriter'

describe('snapshot writers', () => {
  describe('snapshotFileName', () => {
    it('should stamp the name with local date and time', () => {
      expect(snapshotFileName(new Date(2024, 2, 4, 5, 6, 7), 'json')).toBe('snapshot-20240304-050607.json')
      expect(snapshotFileName(new Date(2024, 11, 31, 23, 59, 59), 'txt')).toBe('snapshot-20241231-235959.txt')
    })
  })

  describe('FileSnapshotWriter', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'writer-test-'))
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('should create the output directory and write the file', async () => {
      const outputDir = path.join(tempDir, 'snapshots')
      const writer = new FileSnapshotWriter(outputDir)

      const written = await writer.write('snapshot-1.json', '{}\n')

      expect(written).toBe(path.join(outputDir, 'snapshot-1.json'))
      expect(fs.readFileSync(written, 'utf-8')).toBe('{}\n')
    })
  })

  describe('MemorySnapshotWriter', () => {
    it('should keep written files in memory', async () => {
      const writer = new MemorySnapshotWriter()

      await writer.write('a.json', 'A')
      await writer.write('b.txt', 'B')

      expect(writer.names()).toEqual(['a.json', 'b.txt'])
      expect(writer.get('b.txt')).toBe('B')
      expect(writer.get('c.txt')).toBeNull()

      writer.clear()
      expect(writer.names()).toEqual([])
    })
  })
})
