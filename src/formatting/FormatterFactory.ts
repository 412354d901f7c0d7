import type { FormatterKind, FormatterOptions, SnapshotFormatter } from './Formatter'
import { IndexFormatter } from './formatters/IndexFormatter'
import { JsonFormatter } from './formatters/JsonFormatter'
import { TextFormatter } from './formatters/TextFormatter'

/**
 * Factory for creating snapshot formatters
 */
export class FormatterFactory {
  static createFormatter(kind: FormatterKind, options: FormatterOptions = {}): SnapshotFormatter {
    switch (kind) {
      case 'json':
        return new JsonFormatter()
      case 'text':
        return new TextFormatter(options)
      case 'index':
        return new IndexFormatter()
    }
  }
}
