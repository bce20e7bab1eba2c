export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric severities, matching pino's defaults (higher = more severe).
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const satisfies Record<Capitalize<LogLevelName>, number>

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === "string" && (logLevelNames as readonly string[]).includes(value)
}
