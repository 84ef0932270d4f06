/**
 * One row of the recipient spreadsheet after validation.
 *
 * `email` has passed address-syntax validation and `name` is non-empty.
 * Duplicate addresses are kept; each row is dispatched on its own.
 */
export type RecipientRecord = Readonly<{
  email: string
  name: string
  company?: string
  city?: string
  customMessage?: string

  /** Title of the generated PDF and prefix of its filename. */
  attachmentName?: string
}>

/** A data row excluded from the run. `row` is the 1-indexed sheet row (header is row 1). */
export type RejectedRow = Readonly<{
  row: number
  reason: string
}>

export type RecipientLoadResult = Readonly<{
  recipients: readonly RecipientRecord[]
  rejected: readonly RejectedRow[]

  /** Canonical column names found in the header row. */
  columns: readonly string[]

  /** Non-empty data rows read, accepted or not. */
  totalRows: number
}>

export interface RecipientSource {
  /** Path or label used in logs and errors. */
  readonly name: string

  load(): Promise<RecipientLoadResult>
}
