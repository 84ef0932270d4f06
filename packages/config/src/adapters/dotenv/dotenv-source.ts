import { parse } from "dotenv"
import { readSourceFile } from "../../core/read-source-file"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", "./deploy/.env.production"
   */
  file: string

  /** When false, a missing file yields an empty result. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readSourceFile(this.name, this.opts)

    return content === null ? {} : parse(content)
  }
}
