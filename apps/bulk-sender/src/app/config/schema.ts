import type { Seconds } from "@bulkmail/clock"
import { type LogLevelName, logLevelNames } from "@bulkmail/logger"
import { z } from "zod"
import type { RunConfiguration } from "../../domains/dispatch/model/run.model"

const nonEmpty = z.string().trim().min(1)

const smtpSchema = z.object({
  server: nonEmpty.default("smtp-mail.outlook.com"),
  port: z.int().min(1).max(65_535).default(587),
  use_tls: z.boolean().default(true),
  connection_timeout_seconds: z.number().positive().default(30),
})

const emailSchema = z.object({
  from_name: nonEmpty,
  from_address: z.email().optional(),
  subject: nonEmpty,
})

const settingsSchema = z.object({
  delay_between_sends_seconds: z.number().min(0).default(3),
  max_retries: z.int().min(0).default(2),
  retry_delay_seconds: z.number().min(0).default(2),
  preview_mode: z.boolean().default(false),
})

const filesSchema = z.object({
  recipients_path: nonEmpty.default("data/recipients.xlsx"),
  email_template: nonEmpty.default("templates/email.html"),
  logo_path: nonEmpty.nullish(),
  reports_dir: nonEmpty.default("logs"),
})

/**
 * The JSON file supplies the nested sections; `.env` and the process
 * environment supply credentials and logging. Unknown keys are ignored.
 */
export const configSchema = z.object({
  smtp: smtpSchema.prefault({}),
  email: emailSchema,
  settings: settingsSchema.prefault({}),
  files: filesSchema.prefault({}),

  SMTP_USER: nonEmpty,
  SMTP_PASSWORD: nonEmpty,

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  LOG_FILE: nonEmpty.optional(),
})

export type RawConfig = z.infer<typeof configSchema>

export type AppConfig = {
  run: RunConfiguration

  smtp: {
    user: string
    password: string
    connectionTimeoutSeconds: Seconds
  }

  files: {
    recipientsPath: string
    emailTemplate: string
    logoPath?: string
    reportsDir: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    file?: string
  }

  provenance: ConfigProvenance
}

export type ConfigProvenance = {
  /** Sources that supplied at least one value, in load order. */
  sources: string[]

  /** Source of `SMTP_PASSWORD`, e.g. `"dotenv:.env"` or `"env"`. */
  credentials: string
}
