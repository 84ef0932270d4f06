import type { ReportSink } from "../model/report.model"
import type { RunReport, SendOutcome } from "../model/run.model"

type ReportAccumulatorDeps = {
  runId: string
  startedAt: Date
  sink?: ReportSink
}

/** Collects one run's outcomes in dispatch order. */
export class ReportAccumulator {
  private readonly outcomes: SendOutcome[] = []

  constructor(private readonly deps: ReportAccumulatorDeps) {}

  /** Appends and forwards to the sink; a sink failure rejects. */
  async record(outcome: SendOutcome): Promise<void> {
    this.outcomes.push(outcome)
    await this.deps.sink?.write(outcome)
  }

  get size(): number {
    return this.outcomes.length
  }

  finish(finishedAt: Date, aborted = false): RunReport {
    const outcomes = Object.freeze([...this.outcomes])
    const succeeded = outcomes.filter((o) => o.status === "success").length

    return Object.freeze({
      runId: this.deps.runId,
      outcomes,
      total: outcomes.length,
      succeeded,
      failed: outcomes.length - succeeded,
      startedAt: this.deps.startedAt,
      finishedAt,
      aborted,
    })
  }
}
