import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigError } from "@bulkmail/config"
import { loadAppConfig } from "../load-app-config"

const settings = {
  email: { from_name: "Events Team", subject: "Your invitation" },
}

const credentials = { SMTP_USER: "sender@example.com", SMTP_PASSWORD: "test-secret" }

describe("loadAppConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "app-config-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  const writeSettings = (value: unknown, file = "config.json") =>
    fs.writeFile(path.join(cwd, file), JSON.stringify(value))

  it("fills defaults and takes the sender address from SMTP_USER", async () => {
    await writeSettings(settings)

    const config = await loadAppConfig({ cwd, env: credentials })

    expect(config).toEqual({
      run: {
        smtpServer: "smtp-mail.outlook.com",
        smtpPort: 587,
        useTls: true,
        fromName: "Events Team",
        fromAddress: "sender@example.com",
        subject: "Your invitation",
        delayBetweenSendsSeconds: 3,
        maxRetries: 2,
        retryDelaySeconds: 2,
        previewMode: false,
      },
      smtp: {
        user: "sender@example.com",
        password: "test-secret",
        connectionTimeoutSeconds: 30,
      },
      files: {
        recipientsPath: "data/recipients.xlsx",
        emailTemplate: "templates/email.html",
        reportsDir: "logs",
      },
      logging: { level: "info", prettify: false },
      provenance: { sources: ["json:config.json", "env"], credentials: "env" },
    })
    expect(Object.isFrozen(config.run)).toBe(true)
  })

  it("reads every section of the settings file", async () => {
    await writeSettings(
      {
        smtp: { server: "smtp.example.com", port: 465, use_tls: false },
        email: { ...settings.email, from_address: "events@example.com" },
        settings: {
          delay_between_sends_seconds: 0.5,
          max_retries: 0,
          retry_delay_seconds: 0,
          preview_mode: true,
        },
        files: { recipients_path: "people.csv", logo_path: "logo.png", reports_dir: "out" },
      },
      "custom.json",
    )

    const config = await loadAppConfig({ cwd, configPath: "custom.json", env: credentials })

    expect(config.run).toMatchObject({
      smtpServer: "smtp.example.com",
      smtpPort: 465,
      useTls: false,
      fromAddress: "events@example.com",
      delayBetweenSendsSeconds: 0.5,
      maxRetries: 0,
      previewMode: true,
    })
    expect(config.files).toEqual({
      recipientsPath: "people.csv",
      emailTemplate: "templates/email.html",
      logoPath: "logo.png",
      reportsDir: "out",
    })
  })

  it("takes credentials from .env, overridden by the environment", async () => {
    await writeSettings(settings)
    await fs.writeFile(
      path.join(cwd, ".env"),
      "SMTP_USER=dotenv@example.com\nSMTP_PASSWORD=test-secret\nLOG_PRETTY=true\n",
    )

    const config = await loadAppConfig({ cwd, env: { SMTP_USER: "env@example.com" } })

    expect(config.smtp).toMatchObject({ user: "env@example.com", password: "test-secret" })
    expect(config.logging.prettify).toBe(true)
    expect(config.provenance).toEqual({
      sources: ["json:config.json", "dotenv:.env", "env"],
      credentials: "dotenv:.env",
    })
  })

  it("fails with config_invalid naming a missing credential", async () => {
    await writeSettings(settings)

    const error = await loadAppConfig({ cwd, env: { SMTP_USER: "sender@example.com" } }).catch(
      (err: unknown) => err,
    )

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({ code: "config_invalid" })
    expect(String(error)).toContain("SMTP_PASSWORD")
  })

  it("rejects a negative retry count", async () => {
    await writeSettings({ ...settings, settings: { max_retries: -1 } })

    await expect(loadAppConfig({ cwd, env: credentials })).rejects.toThrow("settings.max_retries")
  })

  it("requires the subject", async () => {
    await writeSettings({ email: { from_name: "Events Team" } })

    await expect(loadAppConfig({ cwd, env: credentials })).rejects.toThrow("email.subject")
  })

  it("fails with config_unreadable when the settings file is missing", async () => {
    await expect(loadAppConfig({ cwd, env: credentials })).rejects.toMatchObject({
      code: "config_unreadable",
    })
  })
})
