import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>
}

/** Reads the process environment (or a given map) as flat string values. */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.env }
  }
}
