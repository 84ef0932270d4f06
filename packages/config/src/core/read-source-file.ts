import fs from "node:fs/promises"
import path from "node:path"
import { ConfigError } from "./config-error"

export type SourceFileOptions = {
  file: string
  required: boolean
  cwd?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Reads a config file relative to `cwd`. Returns `null` when an optional file
 * does not exist; any other failure is a `config_unreadable` ConfigError.
 */
export async function readSourceFile(
  sourceName: string,
  opts: SourceFileOptions,
): Promise<string | null> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isMissingFile(err)) return null

    throw ConfigError.unreadable(sourceName, err)
  }
}
