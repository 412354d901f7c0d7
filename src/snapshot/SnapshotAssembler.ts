import path from 'path'
import type { CollectorConfig, FileRecord, Snapshot, SnapshotMode } from '../contracts'
import { debugLog } from '../logging/debugLog'
import { ContentLoader } from './ContentLoader'
import { MetadataWalker } from './MetadataWalker'
import { PathClassifier, defaultSelfPathResolver } from './PathClassifier'
import { GitCommandRunner, VcsStatusResolver } from './VcsStatusResolver'
import type { FileAttributesReader, ReadPolicy, SelfPathResolver, VcsCommandRunner } from './types'
import { withContent } from './records'

export interface AssemblerDependencies {
  vcsRunner?: VcsCommandRunner
  resolveSelfPath?: SelfPathResolver
  contentLoader?: ContentLoader
  attributesOf?: FileAttributesReader
}

type ContentSelector = (record: FileRecord) => boolean

// Modes only differ in which records get their content attached
const CONTENT_SELECTORS: Record<SnapshotMode, ContentSelector> = {
  full: () => true,
  diff: (record) => record.vcsStatus !== 'Clean' && record.vcsStatus !== 'Deleted',
  minimal: () => false,
}

export class SnapshotAssembler {
  private rootDir: string
  private config: CollectorConfig
  private walker: MetadataWalker
  private resolver: VcsStatusResolver
  private contentLoader: ContentLoader

  constructor(rootDir: string, config: CollectorConfig, deps: AssemblerDependencies = {}) {
    this.rootDir = path.resolve(rootDir)
    this.config = config
    const classifier = new PathClassifier(config, deps.resolveSelfPath ?? defaultSelfPathResolver)
    this.walker = new MetadataWalker(classifier, deps.attributesOf)
    this.resolver = new VcsStatusResolver(deps.vcsRunner ?? new GitCommandRunner(config.vcs.timeoutMs))
    this.contentLoader = deps.contentLoader ?? new ContentLoader()
  }

  /**
   * All files, with content for every eligible file
   */
  collectFull(): Snapshot {
    return this.collect('full')
  }

  /**
   * All files, with content only for files the VCS reports as changed
   */
  collectDiff(): Snapshot {
    return this.collect('diff')
  }

  /**
   * All files, metadata only
   */
  collectMinimal(): Snapshot {
    return this.collect('minimal')
  }

  collect(mode: SnapshotMode): Snapshot {
    MetadataWalker.assertRoot(this.rootDir)

    const statuses = this.resolver.resolve(this.rootDir)
    const records = this.walker.walk(this.rootDir, statuses)

    const selectForContent = CONTENT_SELECTORS[mode]
    const policy = this.readPolicy(mode)
    const files = records.map((record) =>
      policy && selectForContent(record)
        ? withContent(record, this.contentLoader.load(this.absolutePathOf(record), policy))
        : record
    )

    debugLog({
      event: 'snapshot_assembled',
      rootDir: this.rootDir,
      mode,
      fileCount: files.length,
      withContent: files.filter((file) => file.content !== null).length,
    })

    return Object.freeze({
      rootPath: this.rootDir,
      mode,
      files: Object.freeze(files),
    })
  }

  private readPolicy(mode: SnapshotMode): ReadPolicy | null {
    if (mode === 'minimal') return null

    return {
      maxBytes: this.config.sizeCaps[mode],
      textExtensions: this.config.textExtensions,
      binaryExtensions: this.config.binaryExtensions,
      secretPatterns: this.config.secretPatterns,
    }
  }

  private absolutePathOf(record: FileRecord): string {
    return path.join(this.rootDir, ...record.relativePath.split('/'))
  }
}
