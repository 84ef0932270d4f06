import { createTransport } from "nodemailer"
import type Mail from "nodemailer/lib/mailer"
import type SMTPPool from "nodemailer/lib/smtp-pool"
import { EmailTransportError } from "../../core/errors/email-transport-error"
import { validateMessage } from "../../core/validation/validate-message"
import type { EmailRecipient, EmailRecipients } from "../../ports/address"
import type { Attachment, EmailMessage } from "../../ports/message"
import type { EmailTransport, SendResult } from "../../ports/transport"
import { toEmailTransportError } from "./smtp-error"

/** What the adapter reads back from nodemailer after a send. */
export type SmtpSentInfo = {
  messageId?: string
  accepted?: unknown
  rejected?: unknown
}

/** The slice of a nodemailer `Transporter` the adapter uses. */
export interface SmtpClient {
  sendMail(options: Mail.Options): Promise<SmtpSentInfo>
  verify(): Promise<true>
  close(): void
}

export type SmtpConnectionOptions = {
  host: string
  port: number

  /** Upgrade with STARTTLS and refuse to continue without it. Port 465 uses implicit TLS. */
  requireTls: boolean
  user: string
  password: string
  connectionTimeoutMs?: number
}

/**
 * A pool of one connection: the session authenticated for the first message
 * carries every later one until `close()`.
 */
export function smtpPoolOptions(opts: SmtpConnectionOptions): SMTPPool.Options {
  return {
    pool: true,
    maxConnections: 1,
    host: opts.host,
    port: opts.port,
    secure: opts.port === 465,
    requireTLS: opts.requireTls,
    auth: { user: opts.user, pass: opts.password },
    ...(opts.connectionTimeoutMs !== undefined && {
      connectionTimeout: opts.connectionTimeoutMs,
    }),
  }
}

export function createSmtpClient(opts: SmtpConnectionOptions): SmtpClient {
  return createTransport(smtpPoolOptions(opts))
}

export type SmtpTransportDeps = {
  client: SmtpClient
}

export class SmtpTransport implements EmailTransport {
  private closed = false

  constructor(private readonly deps: SmtpTransportDeps) {}

  async verify(): Promise<void> {
    try {
      await this.deps.client.verify()
    } catch (err) {
      throw toEmailTransportError(err)
    }
  }

  async send(message: EmailMessage): Promise<SendResult> {
    validateMessage(message)

    const input = this.toMailOptions(message)

    let response: SmtpSentInfo
    try {
      response = await this.deps.client.sendMail(input)
    } catch (err) {
      throw toEmailTransportError(err)
    }

    if (!response.messageId) {
      throw EmailTransportError.sendFailed(new Error("SMTP did not return a message ID"))
    }

    const accepted = this.toStringArray(response.accepted)
    const rejected = this.toStringArray(response.rejected)

    return {
      provider: "smtp",
      messageId: response.messageId,
      ...(accepted && { accepted }),
      ...(rejected && { rejected }),
    }
  }

  async close(): Promise<void> {
    if (this.closed) return

    this.closed = true
    this.deps.client.close()
  }

  private toMailOptions(message: EmailMessage): Mail.Options {
    return {
      from: this.formatAddress(message.from),
      to: this.toAddressList(message.to),
      ...(message.replyTo && { replyTo: this.formatAddress(message.replyTo) }),
      subject: message.subject,
      ...(message.text && { text: message.text }),
      ...(message.html && { html: message.html }),
      ...(message.headers && { headers: { ...message.headers } }),
      ...(message.attachments && {
        attachments: message.attachments.map((a) => this.toNodemailerAttachment(a)),
      }),
    }
  }

  private toAddressList(recipients: EmailRecipients): Array<string | Mail.Address> {
    const list = Array.isArray(recipients) ? recipients : [recipients]
    return list.map((r) => this.formatAddress(r))
  }

  /** Named addresses go to nodemailer as objects so it can encode the display name. */
  private formatAddress(recipient: EmailRecipient): string | Mail.Address {
    if (typeof recipient === "string") return recipient

    return recipient.name ? { name: recipient.name, address: recipient.email } : recipient.email
  }

  private toNodemailerAttachment(attachment: Attachment): Mail.Attachment {
    return {
      filename: attachment.filename,
      content: Buffer.from(attachment.content),
      ...(attachment.contentType && { contentType: attachment.contentType }),
    }
  }

  private toStringArray(addresses: unknown): string[] | undefined {
    if (!Array.isArray(addresses)) return undefined

    return addresses
      .map((a: unknown) => {
        if (typeof a === "string") return a

        const address = typeof a === "object" && a !== null ? Reflect.get(a, "address") : undefined
        return typeof address === "string" ? address : null
      })
      .filter((a): a is string => a !== null)
  }
}
