import winston from "winston";

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: logFormat,
  defaultMeta: { service: "ravenhold-engine" },
  transports: [
    new winston.transports.Console({
      silent: process.env.NODE_ENV === "test" && process.env.LOG_LEVEL === undefined,
    }),
  ],
});

export function moduleLogger(module: string): winston.Logger {
  return logger.child({ module });
}
