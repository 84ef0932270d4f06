import { ConfigError } from "../../core/config-error"
import { readSourceFile } from "../../core/read-source-file"
import type { ConfigSource } from "../../ports/source"

/**
 * Options for creating a JSON configuration source.
 */
export type JsonSourceOptions = {
  /**
   * Path to the JSON file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config.json", "./config/production.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Returns empty config if file not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readSourceFile(this.name, this.opts)
    if (content === null) return {}

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw ConfigError.unreadable(this.name, err)
    }

    if (!isPlainObject(parsed)) {
      throw ConfigError.unreadable(this.name, new Error("top-level value must be an object"))
    }

    return parsed
  }
}
