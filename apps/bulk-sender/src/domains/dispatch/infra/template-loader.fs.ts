import { readFile } from "node:fs/promises"
import type { Logger } from "@bulkmail/logger"

export const defaultEmailTemplate = `<html>
  <body>
    <h2>Hello {{name}},</h2>
    <p>{{custom_message}}</p>
    <p>Kind regards,<br>{{from_name}}</p>
  </body>
</html>
`

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Reads the HTML body template. A missing file falls back to
 * {@link defaultEmailTemplate} with a warning; any other read error rejects.
 */
export async function loadEmailTemplate(path: string, logger: Logger): Promise<string> {
  try {
    const template = await readFile(path, "utf8")
    logger.info("email template loaded", { path })
    return template
  } catch (err) {
    if (!isMissingFile(err)) throw err

    logger.warn("email template not found, using the built-in template", { path })
    return defaultEmailTemplate
  }
}
