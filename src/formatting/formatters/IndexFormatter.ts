import type { FileRecord } from '../../contracts'
import { BaseFormatter } from './BaseFormatter'

export class IndexFormatter extends BaseFormatter {
  readonly extension = 'txt'

  protected formatFile(file: FileRecord): string {
    return ` - ${file.relativePath} | ${file.language} | ${file.size} | modified ${file.modifiedAt} | git: ${file.vcsStatus}\n`
  }
}
