import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const run = logger.child({ runId: "run-1" })
      const recipient = run.child({ email: "ana@example.com" })

      recipient.info("sent")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        runId: "run-1",
        email: "ana@example.com",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ runId: "run-1" })
      const child = parent.child({ runId: "run-2" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.runId).toBe("run-2")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ runId: "run-1" })
      const child = parent.child({ email: "ana@example.com" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ runId: "run-1" })
      expect(logs[0]?.payload).not.toHaveProperty("email")
      expect(logs[1]?.payload).toMatchObject({
        runId: "run-1",
        email: "ana@example.com",
      })

      clear()
      expect(read()).toEqual([])
    })

    it("per-call meta is written alongside the context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ runId: "run-1" }).warn("retrying", { attempt: 2 })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.level).toBe("warn")
      expect(logs[0]?.payload).toMatchObject({ runId: "run-1", attempt: 2, msg: "retrying" })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
