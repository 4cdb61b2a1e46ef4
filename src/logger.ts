import winston, { format, transports, type Logger } from "winston";

export type { Logger };

export type LoggerOptions = {
  level?: string;
  json?: boolean;
  silent?: boolean;
};

// Everything goes to stderr; stdout is reserved for generated documents.
export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? process.env.LOG_LEVEL ?? "info";
  const json = opts.json ?? true;
  return winston.createLogger({
    level,
    silent: opts.silent ?? false,
    format: json
      ? format.combine(format.timestamp(), format.errors({ stack: true }), format.json())
      : format.combine(format.colorize(), format.errors({ stack: true }), format.simple()),
    transports: [new transports.Console({ stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"] })],
  });
}

export let logger: Logger = createLogger();

export function configureLogger(opts: LoggerOptions): Logger {
  logger = createLogger(opts);
  return logger;
}

export function silentLogger(): Logger {
  return createLogger({ silent: true });
}
