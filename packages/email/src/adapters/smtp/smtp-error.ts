import { EmailTransportError } from "../../core/errors/email-transport-error"

const connectionCodes = new Set(["ECONNECTION", "ETIMEDOUT", "ESOCKET", "EDNS", "ETLS", "EPROXY"])

function property(err: unknown, key: string): unknown {
  return typeof err === "object" && err !== null && key in err ? Reflect.get(err, key) : undefined
}

/**
 * Maps a nodemailer failure onto `EmailTransportError`. Nodemailer tags its
 * errors with a string `code` (EAUTH, ECONNECTION, ...) and, when the server
 * answered, the numeric SMTP `responseCode`.
 */
export function toEmailTransportError(err: unknown): EmailTransportError {
  if (err instanceof EmailTransportError) return err

  const code = property(err, "code")
  const responseCode = property(err, "responseCode")
  const smtpCode = typeof responseCode === "number" ? responseCode : undefined

  if (code === "EAUTH" || smtpCode === 535) {
    return EmailTransportError.authRejected(err)
  }

  if (typeof code === "string" && connectionCodes.has(code)) {
    return EmailTransportError.connectionFailed(err)
  }

  return EmailTransportError.sendFailed(err, smtpCode)
}
