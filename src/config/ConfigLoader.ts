import fs from 'fs'
import path from 'path'
import type { CollectorConfig } from '../contracts/types'
import { CollectorConfigSchema } from '../contracts/schemas'
import { z } from 'zod'

export class ConfigLoader {
  private static DEFAULT_CONFIG: CollectorConfig = CollectorConfigSchema.parse({})

  private config: CollectorConfig

  constructor(private configPath?: string, private searchFrom: string = process.cwd()) {
    this.config = this.loadConfig()
  }

  static defaults(): CollectorConfig {
    return ConfigLoader.DEFAULT_CONFIG
  }

  private findConfigFile(): string | null {
    const configNames = ['.projsnap.config.json', 'projsnap.config.json']

    // Start from the search directory and walk up
    let currentDir = path.resolve(this.searchFrom)

    while (true) {
      for (const configName of configNames) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      const parentDir = path.dirname(currentDir)
      if (parentDir === currentDir) {
        return null
      }
      currentDir = parentDir
    }
  }

  private loadConfig(): CollectorConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)

      // Validate and apply defaults
      return CollectorConfigSchema.parse(parsedConfig)
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return ConfigLoader.DEFAULT_CONFIG
    }
  }

  getConfig(): CollectorConfig {
    return this.config
  }

  reloadConfig(): void {
    this.config = this.loadConfig()
  }
}
