import type { IConfig } from "../ports/config"

/**
 * The result of `loadConfig`: frozen validated values plus, per top-level
 * key, the name of the source that supplied it.
 */
export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Record<string, string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))].filter((name) => name !== "default")
  }
}
