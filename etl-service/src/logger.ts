import pino from "pino";
import type { Logger } from "pino";
import type { ServiceConfig } from "./config.js";

export function createLogger(config: Pick<ServiceConfig, "LOG_LEVEL">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export const silentLogger: Logger = pino({ level: "silent" });
