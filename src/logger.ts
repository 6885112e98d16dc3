import winston from "winston";

/** Level used when neither the caller nor CURVE_LOG_LEVEL picks one */
export const DEFAULT_LOG_LEVEL = "warn";

export function resolveLogLevel(level?: string): string {
  return level ?? process.env.CURVE_LOG_LEVEL ?? DEFAULT_LOG_LEVEL;
}

export const createLogger = (level?: string, label?: string): winston.Logger => {
  return winston.createLogger({
    level: resolveLogLevel(level),
    format: winston.format.combine(
      winston.format.label({ label: label || "curve" }),
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, label, message, ...meta }) =>
        `${timestamp} [${label}] ${level}: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ""}`
      )
    ),
    transports: [new winston.transports.Console()],
  });
};
