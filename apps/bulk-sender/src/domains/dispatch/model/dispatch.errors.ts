import { BaseError, errorMessage } from "@bulkmail/errors"
import { EmailTransportError } from "@bulkmail/email"

export type DispatchErrorCode =
  | "transport_unavailable"
  | "recipients_unavailable"
  | "template_invalid"
  | "attachment_failed"

const appPasswordHint =
  "use an application password if multi-factor authentication is enabled on the account"

export class DispatchError extends BaseError<DispatchErrorCode> {
  static transportUnavailable(input: { server: string; cause: unknown }): DispatchError {
    const authRejected =
      input.cause instanceof EmailTransportError && input.cause.code === "smtp_auth_rejected"

    const message = `Cannot open SMTP session with ${input.server}: ${errorMessage(input.cause)}`

    return new DispatchError(authRejected ? `${message} (${appPasswordHint})` : message, {
      code: "transport_unavailable",
      context: { server: input.server },
      cause: input.cause,
    })
  }

  static recipientsUnavailable(input: {
    source: string
    reason: string
    cause?: unknown
  }): DispatchError {
    return new DispatchError(`Cannot load recipients from ${input.source}: ${input.reason}`, {
      code: "recipients_unavailable",
      context: { source: input.source },
      ...(input.cause !== undefined && { cause: input.cause }),
    })
  }

  static templateInvalid(input: { reason: string; offset: number }): DispatchError {
    return new DispatchError(`Invalid email template: ${input.reason} at offset ${input.offset}`, {
      code: "template_invalid",
      context: { offset: input.offset },
    })
  }

  static attachmentFailed(input: { email: string; cause: unknown }): DispatchError {
    return new DispatchError(`Attachment generation failed: ${errorMessage(input.cause)}`, {
      code: "attachment_failed",
      context: { email: input.email },
      cause: input.cause,
    })
  }
}
