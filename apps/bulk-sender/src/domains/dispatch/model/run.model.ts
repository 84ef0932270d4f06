import type { Seconds } from "@bulkmail/clock"

export type RunConfiguration = Readonly<{
  smtpServer: string
  smtpPort: number
  useTls: boolean

  fromName: string
  fromAddress: string
  subject: string

  delayBetweenSendsSeconds: Seconds

  /** Extra attempts after the first; total attempts per recipient is `maxRetries + 1`. */
  maxRetries: number

  /** Pause between two attempts for the same recipient. */
  retryDelaySeconds: Seconds

  /** Only the first recipient is dispatched. */
  previewMode: boolean
}>

type OutcomeBase = Readonly<{
  email: string
  name: string
  timestamp: Date

  /** Transport attempts made; 0 when the attachment could not be built. */
  attempts: number
}>

export type SucceededOutcome = OutcomeBase &
  Readonly<{
    status: "success"
    messageId: string
  }>

export type FailedOutcome = OutcomeBase &
  Readonly<{
    status: "error"
    errorCode: string
    errorDetail: string
  }>

export type SendOutcome = SucceededOutcome | FailedOutcome

export type SendStatus = SendOutcome["status"]

export type RunReport = Readonly<{
  runId: string
  outcomes: readonly SendOutcome[]
  total: number
  succeeded: number
  failed: number
  startedAt: Date
  finishedAt: Date

  /** Stopped by an abort signal before every recipient was dispatched. */
  aborted: boolean
}>
