import winston from "winston";

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const devFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(ts)} ${level}: ${String(stack ?? message)}${extra}`;
});

function formatFor(nodeEnv: string | undefined): winston.Logform.Format {
  return nodeEnv === "production"
    ? combine(timestamp(), errors({ stack: true }), json())
    : combine(colorize(), timestamp({ format: "HH:mm:ss" }), errors({ stack: true }), devFormat);
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  silent: process.env.NODE_ENV === "test",
  format: formatFor(process.env.NODE_ENV),
  transports: [new winston.transports.Console()],
});

export interface LoggerOptions {
  logLevel: string;
  nodeEnv: string;
}

/** Re-applies level, output format and silence from the parsed config. */
export function configureLogger({ logLevel, nodeEnv }: LoggerOptions): void {
  logger.configure({
    level: logLevel,
    silent: nodeEnv === "test",
    format: formatFor(nodeEnv),
    transports: [new winston.transports.Console()],
  });
}
