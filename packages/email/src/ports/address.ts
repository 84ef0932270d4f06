/** A mailbox with an optional display name, e.g. `"Events Team" <events@example.com>`. */
export type EmailAddress = {
  email: string
  name?: string
}

/** A bare address string or a named mailbox. */
export type EmailRecipient = string | EmailAddress
export type EmailRecipients = EmailRecipient | EmailRecipient[]
