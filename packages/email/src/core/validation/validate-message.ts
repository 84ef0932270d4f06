import { EmailTransportError } from "../errors/email-transport-error"
import type { EmailMessage } from "../../ports/message"

export function validateMessage(message: EmailMessage): void {
  if (!message.text && !message.html) {
    throw EmailTransportError.invalidMessage("EmailMessage requires at least one of text or html")
  }

  if (!message.subject) {
    throw EmailTransportError.invalidMessage("EmailMessage requires a subject")
  }

  const recipients = Array.isArray(message.to) ? message.to : [message.to]
  if (recipients.length === 0) {
    throw EmailTransportError.invalidMessage("EmailMessage requires at least one recipient")
  }

  for (const a of message.attachments ?? []) {
    if (!a.filename) {
      throw EmailTransportError.invalidMessage("Attachments require a filename")
    }
  }
}
