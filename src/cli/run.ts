import path from 'path'
import { createInterface } from 'readline'
import { ConfigLoader } from '../config/ConfigLoader'
import { CommandRegistry, defaultCommands } from '../commands'
import type { Command } from '../commands'
import type { Snapshot } from '../contracts'
import { FormatterFactory } from '../formatting'
import { debugLog } from '../logging/debugLog'
import { FileSnapshotWriter } from '../output/FileSnapshotWriter'
import { snapshotFileName } from '../output/SnapshotWriter'
import type { SnapshotWriter } from '../output/SnapshotWriter'
import { SnapshotAssembler } from '../snapshot/SnapshotAssembler'
import type { AssemblerDependencies } from '../snapshot/SnapshotAssembler'

const FALLBACK_COMMAND = 'minimal'

export const USAGE = `Usage: projsnap [root] [--mode <all|diff|minimal>] [--config <path>]

Without --mode an interactive menu asks for the snapshot mode.
Snapshots are saved to <root>/snapshots as JSON and TXT.`

export interface CliOptions {
  rootDir: string
  mode?: string
  configPath?: string
  help: boolean
}

export interface RunDependencies {
  writer?: SnapshotWriter
  assembler?: AssemblerDependencies
  registry?: CommandRegistry
  now?: () => Date
  prompt?: (question: string) => Promise<string>
  print?: (line: string) => void
}

export interface RunResult {
  snapshot: Snapshot
  command: string
  outputs: string[]
}

export function parseArgs(argv: string[], cwd: string = process.cwd()): CliOptions {
  const options: CliOptions = { rootDir: cwd, help: false }
  let rootSeen = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    switch (arg) {
      case '-h':
      case '--help':
        options.help = true
        break
      case '-m':
      case '--mode':
      case '-c':
      case '--config': {
        const value = argv[i + 1]
        if (value === undefined || value.startsWith('-')) {
          throw new Error(`Missing value for ${arg}`)
        }
        if (arg === '-m' || arg === '--mode') {
          options.mode = value
        } else {
          options.configPath = path.resolve(cwd, value)
        }
        i++
        break
      }
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`)
        }
        if (rootSeen) {
          throw new Error(`Unexpected argument: ${arg}`)
        }
        options.rootDir = path.resolve(cwd, arg)
        rootSeen = true
    }
  }

  return options
}

const askOnStdin = (question: string): Promise<string> =>
  new Promise((resolve) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout })
    let answered = false
    rl.question(question, (answer) => {
      answered = true
      rl.close()
      resolve(answer)
    })
    rl.on('close', () => {
      if (!answered) resolve('')
    })
  })

async function chooseCommand(
  registry: CommandRegistry,
  options: CliOptions,
  prompt: (question: string) => Promise<string>,
  print: (line: string) => void
): Promise<Command> {
  let choice = options.mode
  if (choice === undefined) {
    print('\n📂 Project Snapshot Menu')
    registry.menu().forEach((line) => print(line))
    choice = await prompt(`Choose mode [${registry.getAll().map((_, i) => i + 1).join('/')}]: `)
  }

  const command = registry.get(choice)
  if (command) return command

  print('Invalid choice, defaulting to minimal.')
  const fallback = registry.get(FALLBACK_COMMAND)
  if (!fallback) {
    throw new Error(`No "${FALLBACK_COMMAND}" command registered`)
  }
  return fallback
}

export async function run(options: CliOptions, deps: RunDependencies = {}): Promise<RunResult> {
  const print = deps.print ?? ((line: string) => console.log(line))
  const registry = deps.registry ?? CommandRegistry.createWithDefaults(defaultCommands)

  const config = new ConfigLoader(options.configPath, options.rootDir).getConfig()
  const assembler = new SnapshotAssembler(options.rootDir, config, deps.assembler)

  const command = await chooseCommand(registry, options, deps.prompt ?? askOnStdin, print)
  debugLog({ event: 'command_selected', command: command.name, rootDir: options.rootDir })

  const { snapshot, printContents } = await command.execute(assembler, [])

  print(FormatterFactory.createFormatter('index').format(snapshot))

  const writer = deps.writer ?? new FileSnapshotWriter(path.join(snapshot.rootPath, 'snapshots'))
  const timestamp = (deps.now ?? (() => new Date()))()
  const formatters = [
    FormatterFactory.createFormatter('json'),
    FormatterFactory.createFormatter('text', {
      printContents,
      maxBytesPerFile: config.textOutput.maxBytesPerFile,
    }),
  ]

  const outputs: string[] = []
  for (const formatter of formatters) {
    const outputPath = await writer.write(
      snapshotFileName(timestamp, formatter.extension),
      formatter.format(snapshot)
    )
    print(`✅ Snapshot saved to ${outputPath}`)
    outputs.push(outputPath)
  }

  return { snapshot, command: command.name, outputs }
}
