import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /** Human-readable console output instead of JSON lines. */
  prettify?: boolean

  /**
   * Also append JSON lines to this file (directories are created). Console
   * output is kept.
   */
  file?: string
}
