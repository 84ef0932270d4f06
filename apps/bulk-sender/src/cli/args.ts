import { parseArgs } from "node:util"
import { errorMessage } from "@bulkmail/errors"
import { z } from "zod"
import { UsageError } from "./usage-error"

export type CliCommand =
  | { kind: "menu" }
  | { kind: "send"; skipConfirmation: boolean }
  | { kind: "preview"; to: string }
  | { kind: "help" }

export type CliArgs = {
  command: CliCommand
  configPath?: string
}

export const usage = `Usage: bulk-sender [options]

Without options an interactive menu is shown.

Options:
  --send               send to every recipient after a typed confirmation
  -y, --yes            skip the confirmation (with --send)
  --preview <email>    send one sample message to <email>
  -c, --config <path>  settings file (default: config.json)
  -h, --help           show this help
`

const previewAddress = z.email()

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        send: { type: "boolean" },
        yes: { type: "boolean", short: "y" },
        preview: { type: "string" },
        config: { type: "string", short: "c" },
        help: { type: "boolean", short: "h" },
      },
    }).values
  } catch (err) {
    throw UsageError.invalid(errorMessage(err))
  }
}

/** @throws UsageError on unknown options or conflicting flags. */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const values = readFlags(argv)

  const configPath = values.config !== undefined ? { configPath: values.config } : {}

  if (values.help) return { command: { kind: "help" }, ...configPath }

  if (values.send && values.preview !== undefined) {
    throw UsageError.invalid("--send and --preview cannot be combined")
  }

  if (values.yes && !values.send) {
    throw UsageError.invalid("--yes only applies to --send")
  }

  if (values.preview !== undefined) {
    const to = values.preview.trim()
    if (!previewAddress.safeParse(to).success) {
      throw UsageError.invalid(`--preview needs a valid email address (got "${values.preview}")`)
    }

    return { command: { kind: "preview", to }, ...configPath }
  }

  if (values.send) {
    return { command: { kind: "send", skipConfirmation: values.yes ?? false }, ...configPath }
  }

  return { command: { kind: "menu" }, ...configPath }
}
