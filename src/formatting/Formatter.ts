import type { Snapshot } from '../contracts'

/**
 * Renders a snapshot to text for a file or the console
 */
export interface SnapshotFormatter {
  /**
   * File extension used when the output is saved, without the dot
   */
  readonly extension: string

  format(snapshot: Snapshot): string
}

export type FormatterKind = 'json' | 'text' | 'index'

export interface FormatterOptions {
  /**
   * Include file bodies in text output (default: false)
   */
  printContents?: boolean

  /**
   * Per-file cap on printed content in UTF-8 bytes
   */
  maxBytesPerFile?: number
}
