import { type Clock, SystemClock } from "@bulkmail/clock"
import { createPinoLogger, type Logger } from "@bulkmail/logger"
import { createRetryExecutor, type IRetryExecutor } from "@bulkmail/retry"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
  retryExecutor: IRetryExecutor
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
      ...(config.logging.file && { file: config.logging.file }),
    },
    { service: "bulk-sender" },
  )

  const retryExecutor = createRetryExecutor({ clock })

  return { clock, logger, retryExecutor }
}
