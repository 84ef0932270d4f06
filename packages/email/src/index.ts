export {
  createSmtpClient,
  type SmtpClient,
  type SmtpConnectionOptions,
  type SmtpSentInfo,
  SmtpTransport,
  type SmtpTransportDeps,
  smtpPoolOptions,
} from "./adapters/smtp/smtp-transport"
export {
  EmailTransportError,
  type EmailTransportErrorCode,
} from "./core/errors/email-transport-error"
export { validateMessage } from "./core/validation/validate-message"
export type {
  EmailAddress,
  EmailRecipient,
  EmailRecipients,
} from "./ports/address"
export type { Attachment, EmailContent, EmailMessage } from "./ports/message"
export type { EmailTransport, SendResult } from "./ports/transport"
