/**
 * Configuration Management
 * Loads .env settings for the decide CLI
 */

import { fileURLToPath } from 'node:url'

import * as dotenv from 'dotenv'

import { parseDecideEnv } from './env'
import type { DecideConfig } from './env'

// Load .env file from project root
// ? override:true so .env values take precedence over the shell environment
dotenv.config({
  path: fileURLToPath(new URL('../../.env', import.meta.url)),
  override: true,
})

class ConfigManager {
  private config: DecideConfig

  constructor() {
    const { config, errors } = parseDecideEnv(process.env)
    if (errors.length > 0) {
      console.error('Configuration errors:')
      errors.forEach((error) => console.error(`  - ${error}`))
      process.exit(1)
    }
    this.config = config
  }

  get(): DecideConfig {
    return { ...this.config }
  }
}

// Singleton instance
export const config = new ConfigManager()

export const getConfig = () => config.get()

export type { DecideConfig }
