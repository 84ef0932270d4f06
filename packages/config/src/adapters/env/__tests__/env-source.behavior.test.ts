import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns every variable as given", async () => {
    const env = {
      SMTP_PORT: "587",
      SMTP_SERVER: "smtp.example.com",
      LOG_PRETTY: "true",
    }

    const source = new EnvSource({ env })
    const result = await source.load()

    expect(result).toEqual({
      SMTP_PORT: "587",
      SMTP_SERVER: "smtp.example.com",
      LOG_PRETTY: "true",
    })
  })

  it("uses injected env over process.env", async () => {
    const injected = { CUSTOM: "injected_value" }

    const source = new EnvSource({ env: injected })
    const result = await source.load()

    expect(result).toEqual({ CUSTOM: "injected_value" })
    expect(result).not.toHaveProperty("PATH")
  })
})
