import { createPinoLogger, type Logger } from "@firstwrite/logger"

/** Pino at "warn", so only the config path mismatch and failures are printed. */
export function defaultConfigLogger(): Logger {
  return createPinoLogger({}, { level: "warn" }, { module: "config" })
}
