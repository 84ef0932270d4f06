import type { SendOutcome } from "./run.model"

/**
 * Persists outcomes as they are produced, so an interrupted run keeps the
 * rows written so far.
 */
export interface ReportSink {
  /** Where the report lives, for the closing summary. */
  readonly location: string

  write(outcome: SendOutcome): Promise<void>
  close(): Promise<void>
}
