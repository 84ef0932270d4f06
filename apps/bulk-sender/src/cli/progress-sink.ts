import type { ReportSink } from "../domains/dispatch/model/report.model"
import type { SendOutcome } from "../domains/dispatch/model/run.model"

function progressLine(position: number, total: number, outcome: SendOutcome): string {
  const prefix = `[${position}/${total}]`

  return outcome.status === "success"
    ? `${prefix} sent ${outcome.email}`
    : `${prefix} failed ${outcome.email} (${outcome.errorCode})`
}

/** Forwards outcomes to the report and prints one progress line per recipient. */
export class ProgressSink implements ReportSink {
  private written = 0

  constructor(
    private readonly deps: {
      sink: ReportSink
      total: number
      print: (line: string) => void
    },
  ) {}

  get location(): string {
    return this.deps.sink.location
  }

  async write(outcome: SendOutcome): Promise<void> {
    await this.deps.sink.write(outcome)

    this.written += 1
    this.deps.print(progressLine(this.written, this.deps.total, outcome))
  }

  close(): Promise<void> {
    return this.deps.sink.close()
  }
}
