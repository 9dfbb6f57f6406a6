import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every Logger adapter.
 *
 * @remarks
 * Adapters must honor these options but choose how: pino maps them onto its
 * own options, the console adapter filters and formats by hand.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; entries below it are dropped.
   *
   * @default "info"
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off in production,
   * where log processors expect one JSON object per line.
   */
  prettify?: boolean
}
