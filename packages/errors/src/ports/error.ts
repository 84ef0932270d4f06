export type ErrorCode = Lowercase<string>

/** Structured metadata attached to an error (recipient, file, attempt, …). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same operation might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, rejected credentials,
   * network trouble); `false` for bugs and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/** JSON-safe error shape for logs and reports. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
