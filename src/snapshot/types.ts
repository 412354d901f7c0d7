import type { VcsStatus } from '../contracts'

/**
 * Relative path (forward slashes) to change kind. Paths without an entry are Clean.
 */
export type VcsStatusMap = ReadonlyMap<string, VcsStatus>

/**
 * Returns the canonical path of the running collector artifact, or null when unknown
 */
export type SelfPathResolver = () => string | null

export interface ReadPolicy {
  /** Exclusive upper bound on file size in bytes */
  maxBytes: number
  textExtensions: readonly string[]
  binaryExtensions: readonly string[]
  secretPatterns: readonly string[]
}

export type VcsRunResult =
  | { ok: true; lines: string[] }
  | { ok: false; reason: string }

export interface VcsCommandRunner {
  run(args: readonly string[], cwd: string): VcsRunResult
}

export interface FileAttributes {
  size: number
  modified: Date
}

export type FileAttributesReader = (filePath: string) => FileAttributes
