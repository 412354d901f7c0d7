import type { Snapshot } from '../../contracts'
import type { SnapshotFormatter } from '../Formatter'

export class JsonFormatter implements SnapshotFormatter {
  readonly extension = 'json'

  format(snapshot: Snapshot): string {
    return `${JSON.stringify(snapshot, null, 2)}\n`
  }
}
