import pino, { type Logger } from "pino";
import { getConfig } from "./config";

let rootLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({ name: "bayesnet", level: getConfig().logLevel });
  }
  return rootLogger;
}

export function moduleLogger(module: string): Logger {
  return getLogger().child({ module });
}
