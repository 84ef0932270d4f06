import type { RecipientRecord } from "../model/recipient.model"

const pathSeparators = /[/\\:]/g
const whitespace = /\s+/g

function safe(part: string): string {
  return part.trim().replace(pathSeparators, "_").replace(whitespace, "_")
}

/** `<attachmentName or "document">_<name>.pdf`, stripped of path separators and spaces. */
export function attachmentFilename(recipient: RecipientRecord): string {
  return `${safe(recipient.attachmentName ?? "document")}_${safe(recipient.name)}.pdf`
}
