export type { SnapshotFormatter, FormatterKind, FormatterOptions } from './Formatter'
export { FormatterFactory } from './FormatterFactory'
export { BaseFormatter } from './formatters/BaseFormatter'
export { IndexFormatter } from './formatters/IndexFormatter'
export { JsonFormatter } from './formatters/JsonFormatter'
export { TextFormatter, truncateUtf8 } from './formatters/TextFormatter'
