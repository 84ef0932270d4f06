import { errorMessage } from "@bulkmail/errors"
import ExcelJS from "exceljs"
import { DispatchError } from "../model/dispatch.errors"
import type { RecipientLoadResult, RecipientSource } from "../model/recipient.model"
import { buildLoadResult, normalizeHeader, type RawRow } from "./recipient-rows"

export type XlsxRecipientSourceOptions = {
  path: string
}

/**
 * Recipients from the first worksheet of an `.xlsx` workbook. Row 1 holds the
 * headers; cells are read as their displayed text.
 */
export class XlsxRecipientSource implements RecipientSource {
  readonly name: string

  constructor(private readonly opts: XlsxRecipientSourceOptions) {
    this.name = opts.path
  }

  async load(): Promise<RecipientLoadResult> {
    const workbook = new ExcelJS.Workbook()

    try {
      await workbook.xlsx.readFile(this.opts.path)
    } catch (cause) {
      throw DispatchError.recipientsUnavailable({
        source: this.name,
        reason: errorMessage(cause),
        cause,
      })
    }

    const sheet = workbook.worksheets[0]
    if (!sheet) {
      throw DispatchError.recipientsUnavailable({
        source: this.name,
        reason: "workbook has no worksheets",
      })
    }

    const columnByIndex = new Map<number, string>()
    sheet.getRow(1).eachCell((cell, colNumber) => {
      const column = normalizeHeader(cell.text)
      if (column !== "") columnByIndex.set(colNumber, column)
    })

    const rows: RawRow[] = []
    sheet.eachRow((row, rowNumber) => {
      if (rowNumber === 1) return

      const cells: Record<string, string> = {}
      for (const [colNumber, column] of columnByIndex) {
        cells[column] = row.getCell(colNumber).text
      }
      rows.push({ rowNumber, cells })
    })

    return buildLoadResult(this.name, [...columnByIndex.values()], rows)
  }
}
