import fs from 'fs'
import path from 'path'
import { debugLog } from '../logging/debugLog'
import { isBinaryName, isSecretName } from './PathClassifier'
import type { ReadPolicy } from './types'
import { extensionOf } from './records'

export class ContentLoader {
  private decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

  /**
   * Read a file's text when the policy allows it, otherwise null.
   * Read and decode failures also yield null.
   */
  load(filePath: string, policy: ReadPolicy): string | null {
    try {
      if (!fs.existsSync(filePath)) {
        return null
      }

      const name = path.basename(filePath)

      if (isBinaryName(name, policy.binaryExtensions)) return null
      if (isSecretName(name, policy.secretPatterns)) return null

      const stats = fs.statSync(filePath)
      if (!stats.isFile() || stats.size >= policy.maxBytes) return null

      if (!policy.textExtensions.includes(extensionOf(name))) return null

      return this.decoder.decode(fs.readFileSync(filePath))
    } catch (error) {
      debugLog({
        event: 'content_unreadable',
        filePath,
        error: error instanceof Error ? error.message : String(error),
      })
      return null
    }
  }
}
