import { randomUUID } from "node:crypto"
import { type Clock, secondsToMs } from "@bulkmail/clock"
import type { EmailMessage, EmailTransport } from "@bulkmail/email"
import { type AppError, errorMessage, toAppError } from "@bulkmail/errors"
import type { Logger } from "@bulkmail/logger"
import { constant, type ErrorPredicate, type IRetryExecutor } from "@bulkmail/retry"
import type { AttachmentGenerator } from "../model/attachment.model"
import { DispatchError } from "../model/dispatch.errors"
import type { RecipientRecord } from "../model/recipient.model"
import type { ReportSink } from "../model/report.model"
import type { FailedOutcome, RunConfiguration, RunReport, SendOutcome } from "../model/run.model"
import { attachmentFilename } from "./attachment-filename"
import { ReportAccumulator } from "./report-accumulator"
import { type CompiledTemplate, compileTemplate } from "./template-renderer"
import { templateValues } from "./template-values"

type SendPipelineDeps = {
  transport: EmailTransport
  attachments: AttachmentGenerator
  clock: Clock
  logger: Logger
  retryExecutor: IRetryExecutor

  /** HTML body with `{{placeholder}}`s; compiled once per run. */
  template: string

  newRunId?: () => string
}

export type RunOptions = {
  /** Receives every outcome as soon as it is recorded. */
  sink?: ReportSink

  /** Checked between recipients; the current recipient always completes. */
  signal?: AbortSignal
}

/**
 * Errors flagged as non-retryable (rejected credentials, permanent 5xx
 * refusals, malformed messages) end a recipient's attempts early. Anything
 * without the flag is retried.
 */
const retryableDelivery: ErrorPredicate = {
  shouldRetry: (error) => {
    const appError = toAppError(error)
    return appError.code === "unknown" || appError.isRetryable
  },
}

function assertRunConfiguration(config: RunConfiguration): void {
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
    throw new RangeError(`maxRetries must be an integer >= 0 (got ${config.maxRetries})`)
  }

  if (!Number.isFinite(config.delayBetweenSendsSeconds) || config.delayBetweenSendsSeconds < 0) {
    throw new RangeError(
      `delayBetweenSendsSeconds must be a finite number >= 0 (got ${config.delayBetweenSendsSeconds})`,
    )
  }

  if (!Number.isFinite(config.retryDelaySeconds) || config.retryDelaySeconds < 0) {
    throw new RangeError(
      `retryDelaySeconds must be a finite number >= 0 (got ${config.retryDelaySeconds})`,
    )
  }
}

/**
 * Per-recipient dispatch loop: render, build the attachment, send with
 * bounded retries, record the outcome, pause.
 *
 * One recipient's failure never stops the run. The run itself fails only on
 * a malformed template or when the SMTP session cannot be opened, both before
 * any outcome is produced.
 */
export class SendPipeline {
  constructor(private readonly deps: SendPipelineDeps) {}

  async run(
    recipients: readonly RecipientRecord[],
    config: RunConfiguration,
    options: RunOptions = {},
  ): Promise<RunReport> {
    assertRunConfiguration(config)

    const template = compileTemplate(this.deps.template)
    const selected = config.previewMode ? recipients.slice(0, 1) : recipients

    const runId = (this.deps.newRunId ?? randomUUID)()
    const logger = this.deps.logger.child({ module: "send-pipeline", runId })
    const accumulator = new ReportAccumulator({
      runId,
      startedAt: this.deps.clock.now(),
      ...(options.sink && { sink: options.sink }),
    })

    if (selected.length === 0) {
      logger.info("no recipients to dispatch")
      return accumulator.finish(this.deps.clock.now())
    }

    logger.info("run started", {
      recipients: selected.length,
      previewMode: config.previewMode,
      maxRetries: config.maxRetries,
    })

    let aborted = false

    try {
      await this.openSession(config)

      const pauseMs = secondsToMs(config.delayBetweenSendsSeconds)

      for (const [index, recipient] of selected.entries()) {
        if (options.signal?.aborted) {
          aborted = true
          break
        }

        const outcome = await this.dispatch(recipient, config, template, logger)
        await accumulator.record(outcome)

        const isLast = index === selected.length - 1
        if (!isLast && pauseMs > 0) {
          await this.deps.clock.sleep(pauseMs, options.signal)
        }
      }
    } finally {
      await this.deps.transport.close()
    }

    const report = accumulator.finish(this.deps.clock.now(), aborted)

    logger.info(aborted ? "run interrupted" : "run finished", {
      total: report.total,
      succeeded: report.succeeded,
      failed: report.failed,
      durationMs: report.finishedAt.getTime() - report.startedAt.getTime(),
    })

    return report
  }

  private async openSession(config: RunConfiguration): Promise<void> {
    try {
      await this.deps.transport.verify()
    } catch (cause) {
      throw DispatchError.transportUnavailable({
        server: `${config.smtpServer}:${config.smtpPort}`,
        cause,
      })
    }
  }

  private async dispatch(
    recipient: RecipientRecord,
    config: RunConfiguration,
    template: CompiledTemplate,
    runLogger: Logger,
  ): Promise<SendOutcome> {
    const logger = runLogger.child({ email: recipient.email })
    const html = template.render(templateValues(recipient, config.fromName))

    let pdf: Uint8Array
    try {
      pdf = await this.deps.attachments.generate(recipient)
    } catch (cause) {
      const error =
        cause instanceof DispatchError
          ? cause
          : DispatchError.attachmentFailed({ email: recipient.email, cause })

      logger.error("attachment generation failed", { err: error })
      return this.failed(recipient, 0, error)
    }

    const message: EmailMessage = {
      from: { email: config.fromAddress, name: config.fromName },
      to: { email: recipient.email, name: recipient.name },
      subject: config.subject,
      html,
      attachments: [
        {
          filename: attachmentFilename(recipient),
          content: pdf,
          contentType: this.deps.attachments.contentType,
        },
      ],
    }

    const result = await this.deps.retryExecutor.tryExecute(
      () => this.deps.transport.send(message),
      {
        maxAttempts: config.maxRetries + 1,
        delay: constant({ delay: { milliseconds: secondsToMs(config.retryDelaySeconds) } }),
        errorPredicate: retryableDelivery,
        observer: {
          onError: (err, info) => {
            logger.warn("send attempt failed, retrying", {
              attempt: info.attemptsSoFar,
              nextDelayMs: info.nextDelayMs,
              err,
            })
          },
          onExhausted: (err, info) => {
            logger.error("send failed", { attempt: info.attemptsSoFar, err })
          },
        },
      },
    )

    if (!result.success) {
      return this.failed(recipient, result.attempts, toAppError(result.error, "delivery_failed"))
    }

    logger.info("sent", { attempt: result.attempts, messageId: result.value.messageId })

    return {
      status: "success",
      email: recipient.email,
      name: recipient.name,
      timestamp: this.deps.clock.now(),
      attempts: result.attempts,
      messageId: result.value.messageId,
    }
  }

  private failed(recipient: RecipientRecord, attempts: number, error: AppError): FailedOutcome {
    return {
      status: "error",
      email: recipient.email,
      name: recipient.name,
      timestamp: this.deps.clock.now(),
      attempts,
      errorCode: error.code,
      errorDetail: errorMessage(error),
    }
  }
}
