import { type ConfigSource, DotenvSource, EnvSource, JsonSource, loadConfig } from "@bulkmail/config"
import type { AppConfig, ConfigProvenance, RawConfig } from "./schema"
import { configSchema } from "./schema"

export type LoadAppConfigOptions = {
  /** JSON settings file, relative to `cwd`. */
  configPath?: string
  env?: NodeJS.ProcessEnv
  cwd?: string
}

export const defaultConfigPath = "config.json"

export function mapToAppConfig(raw: RawConfig, provenance: ConfigProvenance): AppConfig {
  return {
    run: Object.freeze({
      smtpServer: raw.smtp.server,
      smtpPort: raw.smtp.port,
      useTls: raw.smtp.use_tls,
      fromName: raw.email.from_name,
      fromAddress: raw.email.from_address ?? raw.SMTP_USER,
      subject: raw.email.subject,
      delayBetweenSendsSeconds: raw.settings.delay_between_sends_seconds,
      maxRetries: raw.settings.max_retries,
      retryDelaySeconds: raw.settings.retry_delay_seconds,
      previewMode: raw.settings.preview_mode,
    }),
    smtp: {
      user: raw.SMTP_USER,
      password: raw.SMTP_PASSWORD,
      connectionTimeoutSeconds: raw.smtp.connection_timeout_seconds,
    },
    files: {
      recipientsPath: raw.files.recipients_path,
      emailTemplate: raw.files.email_template,
      reportsDir: raw.files.reports_dir,
      ...(raw.files.logo_path && { logoPath: raw.files.logo_path }),
    },
    logging: {
      level: raw.LOG_LEVEL,
      prettify: raw.LOG_PRETTY,
      ...(raw.LOG_FILE !== undefined && { file: raw.LOG_FILE }),
    },
    provenance,
  }
}

/**
 * Sources, later wins: the JSON settings file (required), `.env` (optional),
 * then the process environment.
 *
 * @throws ConfigError when the settings file is missing or unparsable, or
 *   when validation fails.
 */
export async function loadAppConfig(options: LoadAppConfigOptions = {}): Promise<AppConfig> {
  const cwd = options.cwd ?? process.cwd()

  const sources: ConfigSource[] = [
    new JsonSource({ file: options.configPath ?? defaultConfigPath, required: true, cwd }),
    new DotenvSource({ file: ".env", required: false, cwd }),
    new EnvSource({ env: options.env ?? process.env }),
  ]

  const result = await loadConfig({ schema: configSchema, sources })

  const used = new Set(result.sourcesUsed())

  return mapToAppConfig(result.value, {
    sources: sources.map((source) => source.name).filter((name) => used.has(name)),
    credentials: result.explain("SMTP_PASSWORD"),
  })
}
