import type { RunReport } from "../domains/dispatch/model/run.model"

export function summarizeReport(report: RunReport, reportLocation?: string): string[] {
  const seconds = (report.finishedAt.getTime() - report.startedAt.getTime()) / 1000
  const verb = report.aborted ? "interrupted" : "finished"

  const lines = [
    `Run ${report.runId} ${verb}: ${report.succeeded} sent, ${report.failed} failed (${report.total} total) in ${seconds.toFixed(1)}s`,
  ]

  for (const outcome of report.outcomes) {
    if (outcome.status === "error") {
      lines.push(`  ${outcome.email}: [${outcome.errorCode}] ${outcome.errorDetail}`)
    }
  }

  if (reportLocation) lines.push(`Report: ${reportLocation}`)

  return lines
}
