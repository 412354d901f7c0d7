import type { Command, CommandRegistry as ICommandRegistry } from './types'

export class CommandRegistry implements ICommandRegistry {
  private commands: Map<string, Command> = new Map()

  register(command: Command): void {
    // Names, aliases and menu numbers share one case-insensitive namespace
    for (const key of [command.name, ...(command.aliases ?? [])]) {
      this.commands.set(key.toLowerCase(), command)
    }
  }

  get(name: string): Command | undefined {
    return this.commands.get(name.trim().toLowerCase())
  }

  getAll(): Command[] {
    // Unique commands in registration order
    return Array.from(new Set(this.commands.values()))
  }

  /**
   * Menu lines such as "1. All (...)", numbered by registration order
   */
  menu(): string[] {
    return this.getAll().map((command, index) => `${index + 1}. ${command.description}`)
  }

  static createWithDefaults(commands: Command[]): CommandRegistry {
    const registry = new CommandRegistry()
    for (const command of commands) {
      registry.register(command)
    }
    return registry
  }
}
