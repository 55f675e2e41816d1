/**
 * Boot configuration type definitions
 */

import type { LogLevel } from '@logging';

export interface LoggingSettings {
  /** Default logger level, overridden by DECIDE_LOG_LEVEL */
  LEVEL: LogLevel;

  /** Colour console output, overridden by DECIDE_LOG_COLORS */
  COLORS: boolean;
}
