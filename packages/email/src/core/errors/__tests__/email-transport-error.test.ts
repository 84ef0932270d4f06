import { BaseError } from "@bulkmail/errors"
import { toEmailTransportError } from "../../../adapters/smtp/smtp-error"
import { EmailTransportError } from "../email-transport-error"

describe("EmailTransportError", () => {
  it("is a BaseError carrying its cause", () => {
    const cause = new Error("socket hang up")
    const error = EmailTransportError.connectionFailed(cause)

    expect(error).toBeInstanceOf(BaseError)
    expect(error.name).toBe("EmailTransportError")
    expect(error.message).toBe("Cannot reach SMTP server: socket hang up")
    expect(error.cause).toBe(cause)
  })

  it("sendFailed without a response code is retryable", () => {
    const error = EmailTransportError.sendFailed(new Error("Message failed"))

    expect(error.isRetryable).toBe(true)
    expect(error.context).toEqual({})
  })
})

describe("toEmailTransportError", () => {
  it("returns EmailTransportError instances unchanged", () => {
    const original = EmailTransportError.invalidMessage("no body")

    expect(toEmailTransportError(original)).toBe(original)
  })

  it("treats a 535 response as rejected credentials", () => {
    const err = Object.assign(new Error("535 Authentication failed"), { responseCode: 535 })

    expect(toEmailTransportError(err).code).toBe("smtp_auth_rejected")
  })

  it.each(["ECONNECTION", "ESOCKET", "EDNS", "ETLS"])("maps %s to a connection failure", (code) => {
    const err = Object.assign(new Error("network"), { code })

    expect(toEmailTransportError(err)).toMatchObject({
      code: "smtp_connection_failed",
      isRetryable: true,
    })
  })

  it("wraps non-Error values as send failures", () => {
    const error = toEmailTransportError("connection reset")

    expect(error).toMatchObject({
      code: "smtp_send_failed",
      message: "connection reset",
      isRetryable: true,
    })
  })
})
