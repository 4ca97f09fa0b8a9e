/**
 * Winston logger shared by the scanner, the backfill and the API server.
 *
 * Lines carry a [component] tag. Production output is one JSON object per
 * line; everything else gets the coloured console layout.
 */

import winston from "winston";
import { config } from "../config/index.js";

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const consoleLine = printf(({ level, message, timestamp, component, ...meta }) => {
  const tag = typeof component === "string" ? `[${component}]` : "[scanner]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} ${level} ${tag} ${message}${metaStr}`;
});

const production = config.nodeEnv === "production";

export const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(errors({ stack: true }), timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" })),
  transports: [
    new winston.transports.Console({
      format: production ? json() : combine(colorize(), consoleLine),
    }),
  ],
});

/** Child logger tagged with a component name */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
