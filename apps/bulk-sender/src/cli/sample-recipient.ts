import type { RecipientRecord } from "../domains/dispatch/model/recipient.model"

/** Stand-in record for `--preview <email>`. */
export function sampleRecipient(email: string): RecipientRecord {
  return {
    email,
    name: "Test Recipient",
    company: "Sample Company",
    city: "Sample City",
    customMessage:
      "This is a preview of the message every recipient will receive, with sample values in place of their own.",
    attachmentName: "Sample Document",
  }
}
