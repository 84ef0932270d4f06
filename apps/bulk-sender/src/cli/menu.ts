import { toAppError } from "@bulkmail/errors"
import type { AppContext } from "../app/create-context"
import { type CliContext, sendAll, sendToFirst, showStats } from "./commands"

const options = [
  "1. Send to all recipients",
  "2. Preview (send to the first recipient only)",
  "3. Show recipient statistics",
  "4. Reload configuration",
  "5. Exit",
]

/**
 * Interactive loop. Failed actions are reported and the menu keeps running;
 * option 5 or end of input leaves it.
 */
export async function runMenu(initial: CliContext, reload: () => Promise<AppContext>): Promise<void> {
  let ctx = initial

  for (;;) {
    ctx.prompt.print()
    for (const option of options) ctx.prompt.print(option)

    const choice = await ctx.prompt.ask("Choose an option (1-5): ")
    if (choice === null || choice === "5") {
      ctx.prompt.print("Bye.")
      return
    }

    try {
      switch (choice) {
        case "1":
          await sendAll(ctx, { skipConfirmation: false })
          break

        case "2":
          await sendToFirst(ctx)
          break

        case "3":
          await showStats(ctx)
          break

        case "4":
          ctx = { ...ctx, app: await reload() }
          ctx.prompt.print("Configuration reloaded.")
          break

        default:
          ctx.prompt.print(`Unknown option "${choice}".`)
      }
    } catch (err) {
      const error = toAppError(err)

      ctx.app.services.core.logger.error("menu action failed", { err: error })
      ctx.prompt.print(`Error: ${error.message}`)
    }
  }
}
