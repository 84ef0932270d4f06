import { readFile } from "node:fs/promises"
import { errorMessage } from "@bulkmail/errors"
import type { Logger } from "@bulkmail/logger"
import { detectImageFormat, type PdfLogo } from "../services/attachment-generator.pdf"

/** Missing or unsupported logos are skipped with a warning; documents are built without one. */
export async function loadLogo(path: string, logger: Logger): Promise<PdfLogo | undefined> {
  let bytes: Uint8Array
  try {
    bytes = await readFile(path)
  } catch (err) {
    logger.warn("logo not readable, documents will have no logo", {
      path,
      reason: errorMessage(err),
    })
    return undefined
  }

  const format = detectImageFormat(bytes)
  if (!format) {
    logger.warn("logo is neither PNG nor JPEG, documents will have no logo", { path })
    return undefined
  }

  return { bytes, format }
}
