import * as winston from "winston";
import type Transport from "winston-transport";
import { DEFAULT_CONFIG, type LogLevel } from "./config";

const lineFormat = winston.format.combine(
  winston.format.splat(),

  winston.format.timestamp(),

  // convert levels to upper case
  winston.format((info) => {
    info.level = info.level.toUpperCase();
    return info;
  })(),

  // TIMESTAMP|LEVEL| MESSAGE
  winston.format.printf((info) => `${String(info.timestamp)}|${info.level}| ${String(info.message)}`),
);

export type TreebankLogger = winston.Logger;

/**
 * Logs go to stderr so stdout can carry tree output. Tests pass their own
 * transport to capture lines.
 */
export function createLogger(level: LogLevel = DEFAULT_CONFIG.logLevel, transport?: Transport): TreebankLogger {
  return winston.createLogger({
    level,
    format: lineFormat,
    transports: [
      transport ??
        new winston.transports.Console({
          stderrLevels: ["error", "warn", "info", "debug"],
        }),
    ],
  });
}
