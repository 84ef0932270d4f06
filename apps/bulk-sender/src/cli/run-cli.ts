import { toAppError } from "@bulkmail/errors"
import type { AppContext } from "../app/create-context"
import { parseCliArgs, usage } from "./args"
import { sendAll, sendPreview } from "./commands"
import { RunInterrupts } from "./interrupts"
import { runMenu } from "./menu"
import { type PromptIo, ReadlinePrompt } from "./prompt"
import { UsageError } from "./usage-error"

export type RunCliDeps = {
  io: PromptIo
  createContext: (configPath?: string) => Promise<AppContext>
  interrupts?: RunInterrupts
}

/**
 * Resolves with the process exit code: 0 once a run completes (even with
 * per-recipient failures), 1 on bad usage or a fatal precondition.
 */
export async function runCli(argv: readonly string[], deps: RunCliDeps): Promise<number> {
  const prompt = new ReadlinePrompt(deps.io)
  const interrupts = deps.interrupts ?? new RunInterrupts()
  let app: AppContext | undefined

  try {
    const args = parseCliArgs(argv)

    if (args.command.kind === "help") {
      prompt.print(usage)
      return 0
    }

    const createContext = () => deps.createContext(args.configPath)
    app = await createContext()
    const ctx = { app, prompt, interrupts }

    switch (args.command.kind) {
      case "send":
        await sendAll(ctx, { skipConfirmation: args.command.skipConfirmation })
        break
      case "preview":
        await sendPreview(ctx, args.command.to)
        break
      case "menu":
        await runMenu(ctx, createContext)
        break
    }

    return 0
  } catch (err) {
    const error = toAppError(err)

    app?.services.core.logger.fatal("bulk-sender stopped", { err: error })
    prompt.print(`Error: ${error.message}`)
    if (err instanceof UsageError) prompt.print(usage)

    return 1
  } finally {
    prompt.close()
  }
}
