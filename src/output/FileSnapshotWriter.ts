import { promises as fs } from 'fs'
import path from 'path'
import { debugLog } from '../logging/debugLog'
import type { SnapshotWriter } from './SnapshotWriter'

export class FileSnapshotWriter implements SnapshotWriter {
  constructor(private outputDir: string) {}

  async ensureDir(): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true })
  }

  async write(fileName: string, contents: string): Promise<string> {
    await this.ensureDir()
    const filePath = path.join(this.outputDir, fileName)
    await fs.writeFile(filePath, contents, 'utf-8')
    debugLog({ event: 'snapshot_written', filePath, bytes: Buffer.byteLength(contents) })
    return filePath
  }
}
