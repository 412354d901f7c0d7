import type { Command, CommandResult } from './types'
import type { SnapshotAssembler } from '../snapshot/SnapshotAssembler'

export const MinimalCommand: Command = {
  name: 'minimal',
  aliases: ['3', 'min'],
  description: 'Minimal (structure + metadata only)',
  execute: async (assembler: SnapshotAssembler): Promise<CommandResult> => ({
    snapshot: assembler.collectMinimal(),
    printContents: false,
  })
}
