import { secondsToMs } from "@bulkmail/clock"
import { createSmtpClient, type SmtpClient } from "@bulkmail/email"
import type { AppConfig } from "../config"

export type InfraClients = {
  /** A new SMTP client per run; each run verifies and closes its own session. */
  smtpClient: () => SmtpClient
}

export function createInfraClients(config: AppConfig): InfraClients {
  return {
    smtpClient: () =>
      createSmtpClient({
        host: config.run.smtpServer,
        port: config.run.smtpPort,
        requireTls: config.run.useTls,
        user: config.smtp.user,
        password: config.smtp.password,
        connectionTimeoutMs: secondsToMs(config.smtp.connectionTimeoutSeconds),
      }),
  }
}
