import { parseCliArgs } from "../args"
import { UsageError } from "../usage-error"

describe("parseCliArgs", () => {
  it("defaults to the interactive menu", () => {
    expect(parseCliArgs([])).toEqual({ command: { kind: "menu" } })
  })

  it("parses --send with and without --yes", () => {
    expect(parseCliArgs(["--send"])).toEqual({
      command: { kind: "send", skipConfirmation: false },
    })
    expect(parseCliArgs(["--send", "-y"])).toEqual({
      command: { kind: "send", skipConfirmation: true },
    })
  })

  it("parses --preview with a trimmed address and a config path", () => {
    expect(parseCliArgs(["--preview", " qa@example.com ", "--config", "prod.json"])).toEqual({
      command: { kind: "preview", to: "qa@example.com" },
      configPath: "prod.json",
    })
  })

  it("gives --help precedence", () => {
    expect(parseCliArgs(["--send", "--help"])).toEqual({ command: { kind: "help" } })
  })

  it.each([
    [["--nope"], "Unknown option '--nope'"],
    [["--send", "--preview", "qa@example.com"], "--send and --preview cannot be combined"],
    [["--yes"], "--yes only applies to --send"],
    [["--preview", "qa"], '--preview needs a valid email address (got "qa")'],
    [["extra"], "Unexpected argument 'extra'"],
  ])("rejects %j", (argv, message) => {
    const parse = () => parseCliArgs(argv)

    expect(parse).toThrow(UsageError)
    expect(parse).toThrow(message)
  })
})
