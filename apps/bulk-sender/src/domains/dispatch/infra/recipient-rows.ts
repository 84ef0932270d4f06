import { z } from "zod"
import { DispatchError } from "../model/dispatch.errors"
import type { RecipientLoadResult, RecipientRecord, RejectedRow } from "../model/recipient.model"

export type RawRow = {
  /** 1-indexed sheet row; the header is row 1. */
  rowNumber: number

  /** Cell text keyed by canonical column name. */
  cells: Readonly<Record<string, string>>
}

const headerAliases: Readonly<Record<string, string>> = {
  nombre: "name",
  empresa: "company",
  ciudad: "city",
  mensaje_personalizado: "custom_message",
  nombre_pdf: "attachment_name",
}

const emailSchema = z.email()

/** Trims, lower-cases and snake-cases a header cell, then resolves aliases. */
export function normalizeHeader(header: string): string {
  const normalized = header.replace(/^\uFEFF/, "").trim().toLowerCase().replace(/\s+/g, "_")

  return headerAliases[normalized] ?? normalized
}

function cell(row: RawRow, column: string): string | undefined {
  const value = row.cells[column]?.trim()

  return value ? value : undefined
}

function toRecord(row: RawRow): RecipientRecord | RejectedRow {
  const email = cell(row, "email")
  const name = cell(row, "name")

  if (!email) return { row: row.rowNumber, reason: "missing email" }
  if (!name) return { row: row.rowNumber, reason: "missing name" }
  if (!emailSchema.safeParse(email).success) {
    return { row: row.rowNumber, reason: `invalid email "${email}"` }
  }

  const company = cell(row, "company")
  const city = cell(row, "city")
  const customMessage = cell(row, "custom_message")
  const attachmentName = cell(row, "attachment_name")

  return Object.freeze({
    email,
    name,
    ...(company && { company }),
    ...(city && { city }),
    ...(customMessage && { customMessage }),
    ...(attachmentName && { attachmentName }),
  })
}

function isBlank(row: RawRow): boolean {
  return Object.values(row.cells).every((value) => value.trim() === "")
}

/**
 * Validates rows already keyed by canonical column names. Blank rows are
 * skipped without being counted.
 *
 * @throws DispatchError `recipients_unavailable` when the `email` or `name`
 *   column is missing.
 */
export function buildLoadResult(
  source: string,
  columns: readonly string[],
  rows: Iterable<RawRow>,
): RecipientLoadResult {
  for (const required of ["email", "name"]) {
    if (!columns.includes(required)) {
      throw DispatchError.recipientsUnavailable({
        source,
        reason: `missing required column "${required}" (found: ${columns.join(", ") || "none"})`,
      })
    }
  }

  const recipients: RecipientRecord[] = []
  const rejected: RejectedRow[] = []
  let totalRows = 0

  for (const row of rows) {
    if (isBlank(row)) continue
    totalRows++

    const result = toRecord(row)
    if ("reason" in result) rejected.push(result)
    else recipients.push(result)
  }

  return { recipients, rejected, columns: [...columns], totalRows }
}
