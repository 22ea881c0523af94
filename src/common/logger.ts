import { pino, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({ name: "ldap-ber-codec", level: "info", ...options });
}

export const defaultLogger: Logger = createLogger();
