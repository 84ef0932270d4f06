import { BaseError, errorMessage } from "@bulkmail/errors"

export type ConfigErrorCode = "config_invalid" | "config_unreadable"

export class ConfigError extends BaseError<ConfigErrorCode> {
  /** Merged values failed schema validation; `details` is the prettified issue list. */
  static invalid(details: string): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
    })
  }

  static unreadable(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Cannot read configuration from ${source}: ${errorMessage(cause)}`, {
      code: "config_unreadable",
      context: { source },
      cause,
    })
  }
}
