import type { SnapshotWriter } from './SnapshotWriter'

export class MemorySnapshotWriter implements SnapshotWriter {
  private files: Map<string, string> = new Map()

  async write(fileName: string, contents: string): Promise<string> {
    this.files.set(fileName, contents)
    return fileName
  }

  get(fileName: string): string | null {
    return this.files.get(fileName) ?? null
  }

  names(): string[] {
    return Array.from(this.files.keys())
  }

  clear(): void {
    this.files.clear()
  }
}
