import { Config } from "../config"

describe("Config", () => {
  const data = { SMTP_PORT: 587, LOG_PRETTY: false, SMTP_SERVER: "smtp.example.com" }
  const provenance = { SMTP_PORT: "env", SMTP_SERVER: "json:config.json" }
  const config = new Config(data, { ...provenance, LOG_PRETTY: "default" })

  it("exposes the validated value", () => {
    expect(config.value).toEqual(data)
    expect(config.value.SMTP_PORT).toBe(587)
  })

  describe("explain", () => {
    it("returns the source name for provided keys", () => {
      expect(config.explain("SMTP_PORT")).toBe("env")
      expect(config.explain("SMTP_SERVER")).toBe("json:config.json")
    })

    it("returns 'default' for keys filled by the schema", () => {
      expect(config.explain("LOG_PRETTY")).toBe("default")
    })

    it("falls back to 'default' when provenance is missing", () => {
      const bare = new Config({ A: 1 }, {})

      expect(bare.explain("A")).toBe("default")
    })
  })

  it("sourcesUsed() returns unique source names in first-seen order, without schema defaults", () => {
    expect(config.sourcesUsed()).toEqual(["env", "json:config.json"])
  })

  it("freezes the value", () => {
    expect(Object.isFrozen(config.value)).toBe(true)
  })
})
