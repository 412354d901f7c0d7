import fs from 'fs'
import path from 'path'
import type { VcsCommandRunner, VcsRunResult } from '../src/snapshot/types'

/**
 * Runner returning canned status output, recording every invocation
 */
export class FakeVcsRunner implements VcsCommandRunner {
  calls: Array<{ args: readonly string[]; cwd: string }> = []

  constructor(private result: VcsRunResult = { ok: true, lines: [] }) {}

  static withLines(...lines: string[]): FakeVcsRunner {
    return new FakeVcsRunner({ ok: true, lines })
  }

  static unavailable(reason: string = 'spawn git ENOENT'): FakeVcsRunner {
    return new FakeVcsRunner({ ok: false, reason })
  }

  run(args: readonly string[], cwd: string): VcsRunResult {
    this.calls.push({ args, cwd })
    return this.result
  }
}

/**
 * Create files under root; keys are forward-slash relative paths
 */
export function writeTree(root: string, files: Record<string, string | Buffer>): void {
  for (const [relativePath, contents] of Object.entries(files)) {
    const filePath = path.join(root, ...relativePath.split('/'))
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, contents)
  }
}
