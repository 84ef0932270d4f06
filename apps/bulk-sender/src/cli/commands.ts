import type { AppContext } from "../app/create-context"
import type { RecipientLoadResult, RecipientRecord } from "../domains/dispatch/model/recipient.model"
import type { RunConfiguration, RunReport } from "../domains/dispatch/model/run.model"
import type { RunInterrupts } from "./interrupts"
import { ProgressSink } from "./progress-sink"
import type { Prompt } from "./prompt"
import { summarizeReport } from "./report-summary"
import { sampleRecipient } from "./sample-recipient"

export type CliContext = {
  app: AppContext
  prompt: Prompt
  interrupts: RunInterrupts
}

const statsPreviewSize = 5

async function loadRecipients(ctx: CliContext): Promise<RecipientLoadResult> {
  const source = ctx.app.services.dispatch.recipientSource()
  const result = await source.load()

  ctx.prompt.print(`Loaded ${result.recipients.length} recipients from ${source.name}`)

  if (result.rejected.length > 0) {
    ctx.prompt.print(`${result.rejected.length} rows rejected:`)
    for (const rejected of result.rejected) {
      ctx.prompt.print(`  row ${rejected.row}: ${rejected.reason}`)
    }
  }

  return result
}

async function dispatch(
  ctx: CliContext,
  recipients: readonly RecipientRecord[],
  run: RunConfiguration,
): Promise<RunReport> {
  const { dispatch: services } = ctx.app.services
  const sink = await services.openReportSink()
  const signal = ctx.interrupts.begin()
  const progress = new ProgressSink({
    sink,
    total: run.previewMode ? Math.min(1, recipients.length) : recipients.length,
    print: (line) => ctx.prompt.print(line),
  })

  try {
    const report = await services.createPipeline().run(recipients, run, { sink: progress, signal })

    for (const line of summarizeReport(report, sink.location)) ctx.prompt.print(line)
    return report
  } finally {
    ctx.interrupts.end()
    await sink.close()
  }
}

/** Menu option 1 and `--send`. Returns null when nothing was sent. */
export async function sendAll(
  ctx: CliContext,
  opts: { skipConfirmation: boolean },
): Promise<RunReport | null> {
  const { recipients } = await loadRecipients(ctx)
  const { run } = ctx.app.config

  if (recipients.length === 0) {
    ctx.prompt.print("No valid recipients, nothing to send.")
    return null
  }

  if (!opts.skipConfirmation) {
    const count = run.previewMode ? 1 : recipients.length
    const answer = await ctx.prompt.ask(
      `Send ${count} email(s) from ${run.fromAddress}? Type "yes" to confirm: `,
    )

    if (answer?.toLowerCase() !== "yes") {
      ctx.prompt.print("Cancelled.")
      return null
    }
  }

  return dispatch(ctx, recipients, run)
}

/** Menu option 2: a preview-mode run, which sends to the first loaded recipient only. */
export async function sendToFirst(ctx: CliContext): Promise<RunReport | null> {
  const { recipients } = await loadRecipients(ctx)

  if (recipients.length === 0) {
    ctx.prompt.print("No valid recipients, nothing to send.")
    return null
  }

  return dispatch(ctx, recipients, { ...ctx.app.config.run, previewMode: true })
}

/** `--preview <email>`: one sample message through the full pipeline. */
export function sendPreview(ctx: CliContext, to: string): Promise<RunReport> {
  return dispatch(ctx, [sampleRecipient(to)], { ...ctx.app.config.run, previewMode: true })
}

/** Menu option 3. */
export async function showStats(ctx: CliContext): Promise<RecipientLoadResult> {
  const result = await loadRecipients(ctx)

  ctx.prompt.print(`Columns: ${result.columns.join(", ")}`)
  ctx.prompt.print(`Valid recipients: ${result.recipients.length}`)
  ctx.prompt.print(`Rejected rows: ${result.rejected.length}`)

  const first = result.recipients.slice(0, statsPreviewSize)
  if (first.length > 0) {
    ctx.prompt.print(`First ${first.length}:`)
    first.forEach((recipient, index) => {
      const details = [recipient.company, recipient.city].filter(Boolean).join(", ")
      ctx.prompt.print(
        `  ${index + 1}. ${recipient.name} <${recipient.email}>${details ? ` (${details})` : ""}`,
      )
    })
  }

  return result
}
