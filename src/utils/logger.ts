import winston from "winston";

// stdout carries the transfer protocol, so every diagnostic goes to stderr.
export interface LoggerOptions {
  level?: string;
  stream?: NodeJS.WritableStream;
}

const lineFormat = winston.format.printf(
  ({ timestamp, level, message, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${timestamp} [${level}] ${message}${extra}`;
  },
);

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level || process.env.LOG_LEVEL || "info",
    format: winston.format.combine(winston.format.timestamp(), lineFormat),
    transports: [
      new winston.transports.Stream({
        stream: options.stream || process.stderr,
      }),
    ],
  });
}

const logger = createLogger();

export default logger;
