import { SmtpTransport } from "@bulkmail/email"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { CsvReportSink } from "../infra/report-sink.csv"
import { loadEmailTemplate } from "../infra/template-loader.fs"
import type { AttachmentGenerator } from "../model/attachment.model"
import type { RecipientSource } from "../model/recipient.model"
import type { ReportSink } from "../model/report.model"
import { PdfAttachmentGenerator } from "../services/attachment-generator.pdf"
import { SendPipeline } from "../services/send-pipeline"
import { loadLogo } from "./load-logo"
import { createRecipientSource } from "./recipient-source-factory"

export type DispatchServices = {
  attachments: AttachmentGenerator

  /** A pipeline bound to a fresh SMTP session. */
  createPipeline: () => SendPipeline

  /** Defaults to the configured recipients file. */
  recipientSource: (path?: string) => RecipientSource

  openReportSink: () => Promise<ReportSink>
}

export async function createDispatchServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): Promise<DispatchServices> {
  const logger = core.logger.child({ module: "dispatch" })

  const template = await loadEmailTemplate(config.files.emailTemplate, logger)
  const logo = config.files.logoPath ? await loadLogo(config.files.logoPath, logger) : undefined

  const attachments = new PdfAttachmentGenerator({ clock: core.clock }, logo ? { logo } : {})

  return {
    attachments,

    createPipeline: () =>
      new SendPipeline({
        transport: new SmtpTransport({ client: infra.smtpClient() }),
        attachments,
        clock: core.clock,
        logger: core.logger,
        retryExecutor: core.retryExecutor,
        template,
      }),

    recipientSource: (path = config.files.recipientsPath) => createRecipientSource(path),

    openReportSink: () => CsvReportSink.create({ clock: core.clock }, { dir: config.files.reportsDir }),
  }
}
