import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns a BaseError unchanged", () => {
    const err = new BaseError("original", { code: "attachment_failed" })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps a plain Error as non-operational with the fallback code", () => {
    const cause = new Error("ETIMEDOUT")
    const result = toAppError(cause, "smtp_send_failed")

    expect(result).toBeInstanceOf(BaseError)
    expect(result.message).toBe("ETIMEDOUT")
    expect(result.code).toBe("smtp_send_failed")
    expect(result.cause).toBe(cause)
    expect(result.isOperational).toBe(false)
  })

  it("defaults the code to unknown", () => {
    expect(toAppError(new Error("x")).code).toBe("unknown")
  })

  it("uses a thrown string as the message", () => {
    const result = toAppError("oops")

    expect(result.message).toBe("oops")
    expect(result.context).toEqual({})
  })

  it("keeps other thrown values in context.value", () => {
    const result = toAppError({ reply: 421 })

    expect(result.message).toBe("Unknown error")
    expect(result.context).toEqual({ value: { reply: 421 } })
  })
})
