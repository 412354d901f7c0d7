export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { AllCommand } from './AllCommand'
export { DiffCommand } from './DiffCommand'
export { MinimalCommand } from './MinimalCommand'

import { AllCommand } from './AllCommand'
import { DiffCommand } from './DiffCommand'
import { MinimalCommand } from './MinimalCommand'

export const defaultCommands = [
  AllCommand,
  DiffCommand,
  MinimalCommand,
]
