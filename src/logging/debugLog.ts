import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when PROJSNAP_DEBUG environment variable is set
const isDebugEnabled = (): boolean =>
  process.env.PROJSNAP_DEBUG === 'true' || process.env.PROJSNAP_DEBUG === '1'

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const logDir = join(homedir(), '.projsnap')
  const logPath = join(logDir, 'debug.log')

  // Ensure directory exists
  mkdirSync(logDir, { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}

/**
 * Non-fatal notice: the run continues after it
 */
export const warn = (message: string): void => {
  console.warn(`⚠️ ${message}`)
  debugLog({ event: 'warning', message })
}
