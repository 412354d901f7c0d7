import fs from 'fs'
import path from 'path'
import type { FileRecord } from '../contracts'
import { SnapshotRootError } from '../errors'
import { debugLog, warn } from '../logging/debugLog'
import { PathClassifier } from './PathClassifier'
import type { FileAttributesReader, VcsStatusMap } from './types'
import { statusOf } from './VcsStatusResolver'
import {
  UNKNOWN_ATTRIBUTE,
  compareByPath,
  createRecord,
  formatSize,
  formatTimestamp,
  languageOf,
} from './records'

const readAttributes: FileAttributesReader = (filePath) => {
  const stats = fs.statSync(filePath)
  return { size: stats.size, modified: stats.mtime }
}

export class MetadataWalker {
  constructor(
    private classifier: PathClassifier,
    private attributesOf: FileAttributesReader = readAttributes
  ) {}

  /**
   * Fails with SnapshotRootError unless rootDir is a readable directory
   */
  static assertRoot(rootDir: string): void {
    let stats: fs.Stats
    try {
      stats = fs.statSync(rootDir)
    } catch {
      throw new SnapshotRootError(rootDir, 'root does not exist or cannot be accessed')
    }
    if (!stats.isDirectory()) {
      throw new SnapshotRootError(rootDir, 'root is not a directory')
    }
  }

  /**
   * One traversal of rootDir. Records carry no content, sorted by relative path.
   */
  walk(rootDir: string, statuses: VcsStatusMap): FileRecord[] {
    MetadataWalker.assertRoot(rootDir)

    const records: FileRecord[] = []

    const walkDir = (currentDir: string, relativeDir: string) => {
      let entries: fs.Dirent[]
      try {
        entries = fs.readdirSync(currentDir, { withFileTypes: true })
      } catch {
        if (relativeDir === '') {
          throw new SnapshotRootError(rootDir, 'root cannot be read')
        }
        warn(`Skipping unreadable directory: ${relativeDir}`)
        return
      }

      for (const entry of entries) {
        const fullPath = path.join(currentDir, entry.name)
        const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name

        if (entry.isDirectory()) {
          if (this.classifier.isIgnoredDirectory(entry.name)) continue
          if (this.classifier.isSelf(fullPath)) continue
          walkDir(fullPath, relativePath)
        } else if (entry.isFile() || (entry.isSymbolicLink() && this.linksToFile(fullPath))) {
          if (this.classifier.isSnapshotArtifact(entry.name)) continue
          if (this.classifier.isIgnoredFile(entry.name, relativePath)) continue
          if (this.classifier.isSelf(fullPath)) continue

          records.push(this.toRecord(fullPath, relativePath, statuses))
        }
      }
    }

    walkDir(rootDir, '')

    records.sort(compareByPath)

    debugLog({
      event: 'metadata_collected',
      rootDir,
      fileCount: records.length,
    })

    return records
  }

  /**
   * Linked files are listed, linked directories are never descended into
   */
  private linksToFile(fullPath: string): boolean {
    try {
      return fs.statSync(fullPath).isFile()
    } catch {
      debugLog({ event: 'dangling_link', fullPath })
      return false
    }
  }

  private toRecord(fullPath: string, relativePath: string, statuses: VcsStatusMap): FileRecord {
    const vcsStatus = statusOf(statuses, relativePath)

    try {
      const attributes = this.attributesOf(fullPath)
      return createRecord({
        relativePath,
        size: formatSize(attributes.size),
        modifiedAt: formatTimestamp(attributes.modified),
        language: languageOf(path.basename(fullPath)),
        content: null,
        vcsStatus,
      })
    } catch {
      debugLog({ event: 'attributes_unreadable', relativePath })
      return createRecord({
        relativePath,
        size: UNKNOWN_ATTRIBUTE,
        modifiedAt: UNKNOWN_ATTRIBUTE,
        language: 'unknown',
        content: null,
        vcsStatus,
      })
    }
  }
}
