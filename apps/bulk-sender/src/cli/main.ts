import { createAppContext } from "../app/create-context"
import { RunInterrupts } from "./interrupts"
import { runCli } from "./run-cli"

const interrupts = new RunInterrupts()

process.on("SIGINT", () => {
  if (interrupts.interrupt()) {
    process.stderr.write("\nInterrupted: stopping after the current recipient (Ctrl+C again to quit)\n")
    return
  }

  process.exit(130)
})

process.exitCode = await runCli(process.argv.slice(2), {
  io: { input: process.stdin, output: process.stdout },
  interrupts,
  createContext: (configPath) => createAppContext(configPath ? { configPath } : {}),
})
