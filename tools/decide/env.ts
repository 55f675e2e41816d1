/**
 * Environment parsing for the decide CLI
 */

import { LOG_LEVELS, LOGGING, parseLogLevel } from '../../src'
import type { LogLevel } from '../../src'

export interface DecideConfig {
  logLevel: LogLevel
  colors: boolean
}

export interface ParsedEnv {
  config: DecideConfig
  errors: string[]
}

/**
 * Read DECIDE_LOG_LEVEL and DECIDE_LOG_COLORS, falling back to LOGGING defaults
 */
export function parseDecideEnv(env: NodeJS.ProcessEnv): ParsedEnv {
  const errors: string[] = []
  const config: DecideConfig = {
    logLevel: LOGGING.LEVEL,
    colors: LOGGING.COLORS,
  }

  const level = env.DECIDE_LOG_LEVEL
  if (level !== undefined && level.trim() !== '') {
    const parsed = parseLogLevel(level, LOG_LEVELS)
    if (parsed === null) {
      errors.push(`DECIDE_LOG_LEVEL must be one of ${Object.keys(LOG_LEVELS).join(', ')} (got "${level}")`)
    } else {
      config.logLevel = parsed
    }
  }

  const colors = env.DECIDE_LOG_COLORS
  if (colors !== undefined && colors.trim() !== '') {
    const value = colors.trim().toLowerCase()
    if (value === 'true') {
      config.colors = true
    } else if (value === 'false') {
      config.colors = false
    } else {
      errors.push(`DECIDE_LOG_COLORS must be true or false (got "${colors}")`)
    }
  }

  return { config, errors }
}
