import type { FileRecord, Language, VcsStatus } from '../contracts'

const SIZE_PREFIXES = 'KMGTPE'

const LANGUAGES: Record<string, Language> = {
  '.java': 'Java',
  '.kt': 'Kotlin',
  '.kts': 'Kotlin',
  '.scala': 'Scala',
  '.groovy': 'Groovy',
  '.py': 'Python',
  '.ts': 'TypeScript',
  '.tsx': 'TSX',
  '.js': 'JavaScript',
  '.jsx': 'JSX',
  '.md': 'Markdown',
  '.json': 'JSON',
  '.yml': 'YAML',
  '.yaml': 'YAML',
  '.xml': 'XML',
  '.html': 'HTML',
  '.htm': 'HTML',
  '.css': 'CSS',
  '.properties': 'Properties',
  '.toml': 'TOML',
  '.ini': 'INI',
}

export const UNKNOWN_ATTRIBUTE = '?'

export function createRecord(fields: FileRecord): FileRecord {
  return Object.freeze({ ...fields })
}

export function withContent(record: FileRecord, content: string | null): FileRecord {
  return createRecord({ ...record, content })
}

export function withStatus(record: FileRecord, vcsStatus: VcsStatus): FileRecord {
  return createRecord({ ...record, vcsStatus })
}

/**
 * Lowercased extension including the dot, taken from the last dot of the name.
 * ".env" yields ".env", "Makefile" yields "".
 */
export function extensionOf(filename: string): string {
  const name = filename.toLowerCase()
  const dot = name.lastIndexOf('.')
  return dot === -1 ? '' : name.substring(dot)
}

export function languageOf(filename: string): Language {
  return LANGUAGES[extensionOf(filename)] ?? 'Other'
}

/**
 * Human-readable size with 1024 scaling, e.g. 512 -> "512 B", 1536 -> "1.5 KB"
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  let exp = 1
  while (exp < SIZE_PREFIXES.length && bytes >= Math.pow(1024, exp + 1)) {
    exp++
  }
  const value = bytes / Math.pow(1024, exp)
  return `${roundHalfEven(value, 2)} ${SIZE_PREFIXES.charAt(exp - 1)}B`
}

/**
 * Ties go to the even neighbour: 1.125 -> 1.12, 1.375 -> 1.38
 */
function roundHalfEven(value: number, digits: number): number {
  const factor = Math.pow(10, digits)
  const scaled = value * factor
  const floor = Math.floor(scaled)
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor
  }
  return Math.round(scaled) / factor
}

const pad = (value: number): string => String(value).padStart(2, '0')

/**
 * Local time as yyyy-MM-dd HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

export function compareByPath(a: FileRecord, b: FileRecord): number {
  if (a.relativePath < b.relativePath) return -1
  if (a.relativePath > b.relativePath) return 1
  return 0
}
