import type { Command, CommandResult } from './types'
import type { SnapshotAssembler } from '../snapshot/SnapshotAssembler'

export const AllCommand: Command = {
  name: 'all',
  aliases: ['1', 'full'],
  description: 'All (full project contents: folders, files, code)',
  execute: async (assembler: SnapshotAssembler): Promise<CommandResult> => ({
    snapshot: assembler.collectFull(),
    printContents: true,
  })
}
