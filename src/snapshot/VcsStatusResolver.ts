import { spawnSync } from 'child_process'
import type { VcsStatus } from '../contracts'
import { DEFAULT_VCS_TIMEOUT_MS } from '../config/defaults'
import { debugLog, warn } from '../logging/debugLog'
import type { VcsCommandRunner, VcsRunResult, VcsStatusMap } from './types'

// Short format honours status.relativePaths, so paths come back relative to the
// snapshot root even when it is a subdirectory of the repository.
export const GIT_STATUS_ARGS = [
  '-c', 'core.quotePath=false',
  '-c', 'color.status=false',
  '-c', 'status.relativePaths=true',
  'status', '--short', '--untracked-files=all',
] as const

/**
 * Runs git synchronously and drains its whole output before returning
 */
export class GitCommandRunner implements VcsCommandRunner {
  constructor(private timeoutMs: number = DEFAULT_VCS_TIMEOUT_MS) {}

  run(args: readonly string[], cwd: string): VcsRunResult {
    const result = spawnSync('git', [...args], {
      cwd,
      encoding: 'utf-8',
      timeout: this.timeoutMs,
      maxBuffer: 64 * 1024 * 1024,
      windowsHide: true,
    })

    if (result.error) {
      return { ok: false, reason: result.error.message }
    }
    if (result.signal) {
      return { ok: false, reason: `git terminated by ${result.signal}` }
    }
    if (result.status !== 0) {
      return { ok: false, reason: `git exited with code ${result.status}: ${result.stderr.trim()}` }
    }

    return { ok: true, lines: result.stdout.split(/\r?\n/) }
  }
}

export function decodeStatus(code: string): VcsStatus {
  switch (code) {
    case 'M':
      return 'Modified'
    case 'A':
      return 'Added'
    case 'D':
      return 'Deleted'
    case 'R':
      return 'Renamed'
    case '??':
      return 'Untracked'
    default:
      return 'Changed'
  }
}

const C_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  '\\': 0x5c,
}

/**
 * Decode a path git wrapped in double quotes: C escapes plus \ooo octal bytes of UTF-8
 */
export function unquoteGitPath(quoted: string): string {
  const chars = Array.from(quoted.slice(1, -1))
  const bytes: number[] = []

  for (let i = 0; i < chars.length; i++) {
    const char = chars[i]
    if (char === '\\' && i + 1 < chars.length) {
      const octal = /^[0-3][0-7]{2}$/.exec(chars.slice(i + 1, i + 4).join(''))
      if (octal) {
        bytes.push(parseInt(octal[0], 8))
        i += 3
        continue
      }
      const escaped = C_ESCAPES[chars[i + 1]]
      if (escaped !== undefined) {
        bytes.push(escaped)
        i++
        continue
      }
    }
    bytes.push(...Buffer.from(char, 'utf-8'))
  }

  return Buffer.from(bytes).toString('utf-8')
}

function normalizeStatusPath(raw: string): string {
  let filePath = raw.trim()

  // Renames are reported as "old -> new"
  const arrow = filePath.indexOf(' -> ')
  if (arrow !== -1) {
    filePath = filePath.substring(arrow + 4).trim()
  }

  if (filePath.length >= 2 && filePath.startsWith('"') && filePath.endsWith('"')) {
    return unquoteGitPath(filePath)
  }

  return filePath.replace(/\\/g, '/')
}

/**
 * Parse "XY path" lines into a path -> change kind map
 */
export function parseStatusLines(lines: readonly string[]): Map<string, VcsStatus> {
  const statuses = new Map<string, VcsStatus>()

  for (const line of lines) {
    if (line.length <= 3) continue

    const code = line.substring(0, 2).trim()
    const filePath = normalizeStatusPath(line.substring(3))
    if (!code || !filePath) continue

    statuses.set(filePath, decodeStatus(code))
  }

  return statuses
}

export function statusOf(statuses: VcsStatusMap, relativePath: string): VcsStatus {
  return statuses.get(relativePath) ?? 'Clean'
}

export class VcsStatusResolver {
  constructor(private runner: VcsCommandRunner = new GitCommandRunner()) {}

  /**
   * One status invocation per call. Never throws: an unavailable VCS means every file is Clean.
   */
  resolve(rootDir: string): VcsStatusMap {
    let result: VcsRunResult
    try {
      result = this.runner.run(GIT_STATUS_ARGS, rootDir)
    } catch (error) {
      result = { ok: false, reason: error instanceof Error ? error.message : String(error) }
    }

    if (!result.ok) {
      warn('Git not available or not a repository.')
      debugLog({ event: 'vcs_unavailable', rootDir, reason: result.reason })
      return new Map()
    }

    const statuses = parseStatusLines(result.lines)
    debugLog({ event: 'vcs_status_resolved', rootDir, changed: statuses.size })
    return statuses
  }
}
