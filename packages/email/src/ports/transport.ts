import type { EmailMessage } from "./message"

export type SendResult = {
  provider: string
  messageId: string

  accepted?: string[]
  rejected?: string[]
}

/**
 * A connection to one mail provider.
 *
 * `send()` performs exactly one delivery attempt; retrying is the caller's
 * concern. Failures are rejected as `EmailTransportError`.
 */
export interface EmailTransport {
  /** Checks once, before any send, that the server is reachable and accepts the credentials. */
  verify(): Promise<void>

  send(message: EmailMessage): Promise<SendResult>

  /** Ends the session kept open across sends. Safe to call more than once. */
  close(): Promise<void>
}
