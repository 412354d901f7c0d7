import fs from 'fs'
import path from 'path'
import type { CollectorConfig } from '../contracts'
import type { SelfPathResolver } from './types'
import { extensionOf } from './records'

/**
 * Resolves the CLI entry script of the running process
 */
export const defaultSelfPathResolver: SelfPathResolver = () => {
  const entry = require.main?.filename ?? process.argv[1]
  if (!entry) return null
  try {
    return fs.realpathSync(entry)
  } catch {
    return null
  }
}

export function isSecretName(filename: string, secretPatterns: readonly string[]): boolean {
  const name = filename.toLowerCase()
  return secretPatterns.some((pattern) => name.includes(pattern))
}

export function isBinaryName(filename: string, binaryExtensions: readonly string[]): boolean {
  const name = filename.toLowerCase()
  return binaryExtensions.some((ext) => name.endsWith(ext))
}

export class PathClassifier {
  private ignoredDirectories: Set<string>
  private ignoredFiles: Set<string>
  private secretPatterns: readonly string[]
  private binaryExtensions: readonly string[]
  private textExtensions: Set<string>
  private selfPath: string | null

  constructor(config: CollectorConfig, resolveSelfPath: SelfPathResolver = defaultSelfPathResolver) {
    this.ignoredDirectories = new Set(config.ignoredDirectories)
    this.ignoredFiles = new Set(config.ignoredFiles)
    this.secretPatterns = config.secretPatterns
    this.binaryExtensions = config.binaryExtensions
    this.textExtensions = new Set(config.textExtensions)
    this.selfPath = resolveSelfPath()
  }

  isIgnoredDirectory(segment: string): boolean {
    return this.ignoredDirectories.has(segment)
  }

  /**
   * True when the file is excluded from the walk entirely
   */
  isIgnoredFile(filename: string, relativePath: string): boolean {
    const segments = relativePath.split(/[\\/]/)
    if (segments.slice(0, -1).some((segment) => this.isIgnoredDirectory(segment))) {
      return true
    }

    if (this.ignoredFiles.has(filename.toLowerCase())) return true
    return this.isSecret(filename) || this.isBinary(filename)
  }

  /**
   * Only allow-listed extensions get content, even when the file is not ignored
   */
  isEligibleForContent(filename: string): boolean {
    return this.textExtensions.has(extensionOf(filename))
  }

  isSecret(filename: string): boolean {
    return isSecretName(filename, this.secretPatterns)
  }

  isBinary(filename: string): boolean {
    return isBinaryName(filename, this.binaryExtensions)
  }

  /**
   * Output of a previous run, e.g. snapshot-20240101-120000.json
   */
  isSnapshotArtifact(filename: string): boolean {
    const name = filename.toLowerCase()
    return name.startsWith('snapshot-') && (name.endsWith('.json') || name.endsWith('.txt'))
  }

  isSelf(absolutePath: string): boolean {
    if (!this.selfPath) return false

    let realPath: string
    try {
      realPath = fs.realpathSync(absolutePath)
    } catch {
      return false
    }

    const relative = path.relative(this.selfPath, realPath)
    return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
  }
}
