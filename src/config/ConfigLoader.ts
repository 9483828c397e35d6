import fs from 'fs'
import path from 'path'
import { DecodiffConfig } from '../contracts/types'
import { DecodiffConfigSchema } from '../contracts/schemas'
import { z } from 'zod'

export class ConfigLoader {
  private static DEFAULT_CONFIG: DecodiffConfig = {
    input: {
      acceptedExtensions: ['.json', '.txt'],
      warningMarker: 'WARNING:',
    },
    output: {
      defaultName: 'DecoChanges',
      spreadsheet: {
        sheetStyle: 'TableStyleLight1',
        columnPadding: 6,
      },
    },
    prompt: {
      openCreatedFiles: true,
    },
  }

  private readonly config: DecodiffConfig

  constructor(
    private configPath?: string,
    private startDir: string = process.cwd()
  ) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    const configNames = ['.decodiff.config.json', 'decodiff.config.json']

    // Start from the working directory and walk up
    let currentDir = path.resolve(this.startDir)

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

  private loadConfig(): DecodiffConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)

      // Validate and apply defaults
      return DecodiffConfigSchema.parse(parsedConfig)
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

  getConfig(): DecodiffConfig {
    return this.config
  }
}
