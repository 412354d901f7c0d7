export * from './contracts'
export { SnapshotRootError } from './errors'
export { ConfigLoader } from './config/ConfigLoader'
export { SnapshotAssembler } from './snapshot/SnapshotAssembler'
export type { AssemblerDependencies } from './snapshot/SnapshotAssembler'
export { MetadataWalker } from './snapshot/MetadataWalker'
export { ContentLoader } from './snapshot/ContentLoader'
export { PathClassifier, defaultSelfPathResolver } from './snapshot/PathClassifier'
export {
  GitCommandRunner,
  VcsStatusResolver,
  parseStatusLines,
  decodeStatus,
  statusOf,
} from './snapshot/VcsStatusResolver'
export { withContent, withStatus, formatSize, formatTimestamp, languageOf } from './snapshot/records'
export type {
  FileAttributes,
  FileAttributesReader,
  ReadPolicy,
  SelfPathResolver,
  VcsCommandRunner,
  VcsRunResult,
  VcsStatusMap,
} from './snapshot/types'
export * from './formatting'
export type { SnapshotWriter } from './output/SnapshotWriter'
export { snapshotFileName } from './output/SnapshotWriter'
export { FileSnapshotWriter } from './output/FileSnapshotWriter'
export { MemorySnapshotWriter } from './output/MemorySnapshotWriter'
