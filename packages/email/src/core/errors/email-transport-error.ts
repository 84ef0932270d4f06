import { BaseError, errorMessage } from "@bulkmail/errors"

export type EmailTransportErrorCode =
  | "smtp_auth_rejected"
  | "smtp_connection_failed"
  | "smtp_send_failed"
  | "invalid_message"

export class EmailTransportError extends BaseError<EmailTransportErrorCode> {
  static authRejected(cause: unknown): EmailTransportError {
    return new EmailTransportError(`SMTP server rejected the credentials: ${errorMessage(cause)}`, {
      code: "smtp_auth_rejected",
      cause,
    })
  }

  static connectionFailed(cause: unknown): EmailTransportError {
    return new EmailTransportError(`Cannot reach SMTP server: ${errorMessage(cause)}`, {
      code: "smtp_connection_failed",
      cause,
      isRetryable: true,
    })
  }

  /**
   * Delivery refused or interrupted. Permanent (5xx) rejections are not
   * retryable; anything else is.
   */
  static sendFailed(cause: unknown, responseCode?: number): EmailTransportError {
    const permanent = responseCode !== undefined && responseCode >= 500

    return new EmailTransportError(errorMessage(cause), {
      code: "smtp_send_failed",
      cause,
      isRetryable: !permanent,
      ...(responseCode !== undefined && { context: { responseCode } }),
    })
  }

  static invalidMessage(reason: string): EmailTransportError {
    return new EmailTransportError(reason, { code: "invalid_message" })
  }
}
