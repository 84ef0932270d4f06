import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: async () => ({
    source: new EnvSource({ env: { SMTP_USER: "sender@example.com" } }),
  }),
  setup: async () => {},
  expectedValue: () => ({ SMTP_USER: "sender@example.com" }),
})
