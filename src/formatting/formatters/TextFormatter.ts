import type { FileRecord, Snapshot } from '../../contracts'
import { DEFAULT_TEXT_OUTPUT_CAP_BYTES } from '../../config/defaults'
import type { FormatterOptions } from '../Formatter'
import { BaseFormatter } from './BaseFormatter'

const FILE_RULE = '═'.repeat(62)
const CONTENT_BANNER = '──────────────── FILE CONTENT ────────────────'

/**
 * Cut text to at most maxBytes of UTF-8 without splitting a character
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  const encoded = Buffer.from(text, 'utf-8')
  if (encoded.length <= maxBytes) return text

  let end = maxBytes
  // Step back over continuation bytes (10xxxxxx)
  while (end > 0 && (encoded[end] & 0xc0) === 0x80) {
    end--
  }
  return encoded.subarray(0, end).toString('utf-8')
}

export class TextFormatter extends BaseFormatter {
  readonly extension = 'txt'
  private printContents: boolean
  private maxBytesPerFile: number

  constructor(options: FormatterOptions = {}) {
    super()
    this.printContents = options.printContents ?? false
    this.maxBytesPerFile = options.maxBytesPerFile ?? DEFAULT_TEXT_OUTPUT_CAP_BYTES
  }

  protected header(snapshot: Snapshot): string {
    return `${super.header(snapshot)}\n`
  }

  protected formatFile(file: FileRecord): string {
    let block = `${FILE_RULE}\n`
    block += `📄 ${file.relativePath} (${file.language}, ${file.size}, modified ${file.modifiedAt}, git: ${file.vcsStatus})\n`

    if (this.printContents && file.content !== null) {
      block += `${CONTENT_BANNER}\n`
      const truncated = truncateUtf8(file.content, this.maxBytesPerFile)
      block += truncated === file.content
        ? `${file.content}\n`
        : `${truncated}\n…(truncated in TXT)\n`
    }

    return `${block}\n`
  }
}
