import { BaseError } from "@bulkmail/errors"

export class UsageError extends BaseError<"usage_invalid"> {
  static invalid(reason: string): UsageError {
    return new UsageError(reason, { code: "usage_invalid" })
  }
}
