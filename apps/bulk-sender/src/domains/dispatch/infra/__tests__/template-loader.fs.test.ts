import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { Logger } from "@bulkmail/logger"
import { mock } from "vitest-mock-extended"
import { defaultEmailTemplate, loadEmailTemplate } from "../template-loader.fs"

describe("loadEmailTemplate", () => {
  let dir: string
  const logger = mock<Logger>()

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "template-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("returns the file contents", async () => {
    const file = path.join(dir, "email.html")
    await fs.writeFile(file, "<p>Hi {{name}}</p>")

    await expect(loadEmailTemplate(file, logger)).resolves.toBe("<p>Hi {{name}}</p>")
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it("falls back to the built-in template with a warning when the file is missing", async () => {
    const file = path.join(dir, "missing.html")

    await expect(loadEmailTemplate(file, logger)).resolves.toBe(defaultEmailTemplate)
    expect(logger.warn).toHaveBeenCalledWith(
      "email template not found, using the built-in template",
      { path: file },
    )
  })

  it("rejects other read errors", async () => {
    await expect(loadEmailTemplate(dir, logger)).rejects.toMatchObject({ code: "EISDIR" })
  })
})
