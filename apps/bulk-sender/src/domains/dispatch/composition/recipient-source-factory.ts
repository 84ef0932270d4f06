import { extname } from "node:path"
import { CsvRecipientSource } from "../infra/recipient-source.csv"
import { XlsxRecipientSource } from "../infra/recipient-source.xlsx"
import { DispatchError } from "../model/dispatch.errors"
import type { RecipientSource } from "../model/recipient.model"

/** Picks the reader by file extension. */
export function createRecipientSource(path: string): RecipientSource {
  const extension = extname(path).toLowerCase()

  switch (extension) {
    case ".xlsx":
      return new XlsxRecipientSource({ path })
    case ".csv":
      return new CsvRecipientSource({ path })
    default:
      throw DispatchError.recipientsUnavailable({
        source: path,
        reason: `unsupported file type "${extension}" (expected .xlsx or .csv)`,
      })
  }
}
