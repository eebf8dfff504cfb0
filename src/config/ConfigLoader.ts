import fs from 'fs'
import path from 'path'
import { ReconcileConfig } from '../contracts/types'
import { ReconcileConfigSchema } from '../contracts/schemas'
import { z } from 'zod'

export const CONFIG_FILE_NAMES = ['.reconcile.config.json', 'reconcile.config.json']

const defaultConfig = (): ReconcileConfig => ({
  activeRecipes: [],
  failOnInvalidActiveRecipes: false,
  cleanEmptyDirectories: true,
  reportOutputDirectory: 'target/rewrite',
  diff: {
    contextLines: 3,
  },
})

const copyConfig = (config: ReconcileConfig): ReconcileConfig => ({
  ...config,
  activeRecipes: [...config.activeRecipes],
  diff: { ...config.diff },
})

export class ConfigLoader {
  private config: ReconcileConfig

  constructor(private configPath?: string, private startDir: string = process.cwd()) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    // Start from the working directory and walk up
    let currentDir = path.resolve(this.startDir)

    while (true) {
      for (const configName of CONFIG_FILE_NAMES) {
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

  private loadConfig(): ReconcileConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return defaultConfig()
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)

      // Validate and apply defaults
      return ReconcileConfigSchema.parse(parsedConfig)
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return defaultConfig()
    }
  }

  /**
   * A copy of the loaded config; changes to it do not reach other callers
   */
  getConfig(): ReconcileConfig {
    return copyConfig(this.config)
  }

  /**
   * Recipes activated by configuration plus those named on the input,
   * without duplicates, configuration first
   */
  getActiveRecipes(additional: string[] = []): string[] {
    return Array.from(new Set([...this.config.activeRecipes, ...additional]))
  }
}
