import type { Command, CommandResult } from './types'
import type { SnapshotAssembler } from '../snapshot/SnapshotAssembler'

export const DiffCommand: Command = {
  name: 'diff',
  aliases: ['2', 'git-diff'],
  description: 'Git diff (only changes, with full contents)',
  execute: async (assembler: SnapshotAssembler): Promise<CommandResult> => ({
    snapshot: assembler.collectDiff(),
    // Bodies stay in the JSON output; the text file is an index
    printContents: false,
  })
}
