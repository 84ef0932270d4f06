import type { RecipientRecord } from "./recipient.model"

export interface AttachmentGenerator {
  /** MIME type of the produced bytes. */
  readonly contentType: string

  generate(recipient: RecipientRecord): Promise<Uint8Array>
}
