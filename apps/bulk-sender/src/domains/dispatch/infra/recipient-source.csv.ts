import { createReadStream } from "node:fs"
import { errorMessage } from "@bulkmail/errors"
import csv from "csv-parser"
import { DispatchError } from "../model/dispatch.errors"
import type { RecipientLoadResult, RecipientSource } from "../model/recipient.model"
import { buildLoadResult, normalizeHeader, type RawRow } from "./recipient-rows"

export type CsvRecipientSourceOptions = {
  path: string
  separator?: string
}

/** Comma-separated recipients with a header row. */
export class CsvRecipientSource implements RecipientSource {
  readonly name: string

  constructor(private readonly opts: CsvRecipientSourceOptions) {
    this.name = opts.path
  }

  load(): Promise<RecipientLoadResult> {
    return new Promise((resolve, reject) => {
      let columns: string[] = []
      const rows: RawRow[] = []

      const fail = (cause: unknown) => {
        reject(
          DispatchError.recipientsUnavailable({
            source: this.name,
            reason: errorMessage(cause),
            cause,
          }),
        )
      }

      const input = createReadStream(this.opts.path)
      input.on("error", fail)

      input
        .pipe(
          csv({
            separator: this.opts.separator ?? ",",
            mapHeaders: ({ header }) => {
              const column = normalizeHeader(header)
              return column === "" ? null : column
            },
          }),
        )
        .on("headers", (headers: string[]) => {
          columns = headers
        })
        .on("data", (cells: Record<string, string>) => {
          rows.push({ rowNumber: rows.length + 2, cells })
        })
        .on("end", () => {
          try {
            resolve(buildLoadResult(this.name, columns, rows))
          } catch (err) {
            reject(err)
          }
        })
        .on("error", fail)
    })
  }
}
