import type { FileRecord, Snapshot } from '../../contracts'
import type { SnapshotFormatter } from '../Formatter'

/**
 * Line-oriented formatter: a header followed by one block per file
 */
export abstract class BaseFormatter implements SnapshotFormatter {
  abstract readonly extension: string

  format(snapshot: Snapshot): string {
    const lines = [this.header(snapshot)]
    for (const file of snapshot.files) {
      lines.push(this.formatFile(file))
    }
    return lines.join('')
  }

  protected header(snapshot: Snapshot): string {
    return `📂 Project Snapshot at: ${snapshot.rootPath}\n`
  }

  protected abstract formatFile(file: FileRecord): string
}
