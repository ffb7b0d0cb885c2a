import winston from "winston";

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});

/**
 * Child logger tagged with the component it logs for.
 */
export function createLogger(scope: string): winston.Logger {
  return logger.child({ scope });
}

/**
 * Applies the configured level after the environment has been parsed.
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}
