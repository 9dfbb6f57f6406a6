export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric severities, higher is more severe. Same scale as pino.
 */
export const LogLevels = {
  /** Finest-grained diagnostic information. */
  Trace: 10,
  /** Per-update detail: snapshot versions, selected SVIDs. */
  Debug: 20,
  /** Lifecycle milestones: first update received, source closed. */
  Info: 30,
  /** Recoverable trouble, e.g. a watch error while a snapshot is still served. */
  Warn: 40,
  /** Failures of the current operation. */
  Error: 50,
  /** The process is unlikely to continue. */
  Fatal: 60,
} as const satisfies Record<Capitalize<LogLevelName>, number>

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export const LEVEL_SEVERITY: Readonly<Record<LogLevelName, LogLevel>> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
}
