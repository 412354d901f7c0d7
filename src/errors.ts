/**
 * Raised when the snapshot root itself cannot be walked.
 * No partial snapshot is produced after it.
 */
export class SnapshotRootError extends Error {
  constructor(
    readonly rootPath: string,
    reason: string
  ) {
    super(`Cannot snapshot ${rootPath}: ${reason}`)
    this.name = 'SnapshotRootError'
  }
}
