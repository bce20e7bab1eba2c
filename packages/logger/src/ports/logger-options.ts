import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every Logger adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; anything below is dropped.
   */
  level: LogLevelName

  /**
   * Render human-readable lines instead of JSON. Local development only.
   */
  prettify?: boolean
}
