import { type FileHandle, mkdir, open } from "node:fs/promises"
import { join } from "node:path"
import type { TimeSource } from "@bulkmail/clock"
import type { ReportSink } from "../model/report.model"
import type { SendOutcome } from "../model/run.model"

export type CsvReportSinkOptions = {
  dir: string
}

export type CsvReportSinkDeps = {
  clock: TimeSource
}

const header = ["email", "name", "status", "timestamp", "error"]
const needsQuoting = /[",\r\n]/

export function csvField(value: string): string {
  return needsQuoting.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export function csvLine(fields: readonly string[]): string {
  return `${fields.map(csvField).join(",")}\r\n`
}

/** `report_YYYYMMDD_HHMMSS.csv` in UTC, with `_<n>` appended on collision. */
export function reportFilename(at: Date, collision = 0): string {
  const iso = at.toISOString()
  const stamp = `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`

  return collision === 0 ? `report_${stamp}.csv` : `report_${stamp}_${collision}.csv`
}

function outcomeFields(outcome: SendOutcome): string[] {
  return [
    outcome.email,
    outcome.name,
    outcome.status,
    outcome.timestamp.toISOString(),
    outcome.status === "error" ? outcome.errorDetail : "",
  ]
}

function alreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST"
}

/**
 * One CSV file per run. The header is written on creation and each outcome is
 * appended as it arrives, so a crashed run keeps its partial report.
 */
export class CsvReportSink implements ReportSink {
  private closed = false

  private constructor(
    readonly location: string,
    private readonly file: FileHandle,
  ) {}

  static async create(deps: CsvReportSinkDeps, opts: CsvReportSinkOptions): Promise<CsvReportSink> {
    await mkdir(opts.dir, { recursive: true })

    const createdAt = deps.clock.now()

    for (let collision = 0; ; collision++) {
      const location = join(opts.dir, reportFilename(createdAt, collision))

      let file: FileHandle
      try {
        file = await open(location, "wx")
      } catch (err) {
        if (alreadyExists(err)) continue
        throw err
      }

      const sink = new CsvReportSink(location, file)
      await sink.append(csvLine(header))
      return sink
    }
  }

  async write(outcome: SendOutcome): Promise<void> {
    await this.append(csvLine(outcomeFields(outcome)))
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    await this.file.close()
  }

  private async append(line: string): Promise<void> {
    if (this.closed) throw new Error(`Report ${this.location} is already closed`)

    await this.file.write(line)
  }
}
