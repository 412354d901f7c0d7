export type VcsStatus =
  | 'Clean'
  | 'Modified'
  | 'Added'
  | 'Deleted'
  | 'Renamed'
  | 'Untracked'
  | 'Changed'

export type Language =
  | 'Java'
  | 'Kotlin'
  | 'Scala'
  | 'Groovy'
  | 'Python'
  | 'TypeScript'
  | 'TSX'
  | 'JavaScript'
  | 'JSX'
  | 'Markdown'
  | 'JSON'
  | 'YAML'
  | 'XML'
  | 'HTML'
  | 'CSS'
  | 'Properties'
  | 'TOML'
  | 'INI'
  | 'Other'
  | 'unknown'

export type SnapshotMode = 'full' | 'diff' | 'minimal'

export interface FileRecord {
  readonly relativePath: string
  readonly size: string
  readonly modifiedAt: string
  readonly language: Language
  readonly content: string | null
  readonly vcsStatus: VcsStatus
}

export interface Snapshot {
  readonly rootPath: string
  readonly mode: SnapshotMode
  readonly files: readonly FileRecord[]
}

export interface CollectorConfig {
  ignoredDirectories: string[]
  ignoredFiles: string[]
  secretPatterns: string[]
  binaryExtensions: string[]
  textExtensions: string[]
  sizeCaps: {
    full: number
    diff: number
  }
  textOutput: {
    maxBytesPerFile: number
  }
  vcs: {
    timeoutMs: number
  }
}
