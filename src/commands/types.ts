import type { Snapshot } from '../contracts'
import type { SnapshotAssembler } from '../snapshot/SnapshotAssembler'

export interface CommandResult {
  snapshot: Snapshot
  /**
   * Whether the text output should carry file bodies
   */
  printContents: boolean
}

export interface Command {
  name: string
  aliases?: string[]
  description: string
  execute: (assembler: SnapshotAssembler, args: string[]) => Promise<CommandResult>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
}
