import winston from "winston";

const LEVELS = {
  critical: 0,
  error: 1,
  warning: 2,
  success: 3,
  info: 4,
  debug: 5,
};

type LogLevel = keyof typeof LEVELS;

winston.addColors({
  critical: "bold red",
  error: "red",
  warning: "yellow",
  success: "green",
  info: "cyan",
  debug: "gray",
});

function resolveLevel(raw: string | undefined): LogLevel {
  switch (raw) {
    case "critical":
    case "error":
    case "warning":
    case "success":
    case "info":
    case "debug":
      return raw;
    default:
      return "info";
  }
}

const base = winston.createLogger({
  levels: LEVELS,
  level: resolveLevel(process.env.LOG_LEVEL),
  silent: process.env.LOG_SILENT === "true",
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    winston.format.colorize({ level: true }),
    winston.format.printf(
      (info) => `${String(info.timestamp)} ${info.level} ${String(info.message)}`
    )
  ),
  transports: [new winston.transports.Console()],
});

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}

function write(level: LogLevel, message: string, err?: unknown): void {
  base.log(level, err === undefined ? message : `${message} ${describeError(err)}`);
}

export const logger = {
  critical: (message: string, err?: unknown) => write("critical", message, err),
  error: (message: string, err?: unknown) => write("error", message, err),
  warning: (message: string) => write("warning", message),
  success: (message: string) => write("success", message),
  info: (message: string) => write("info", message),
  debug: (message: string) => write("debug", message),
  setLevel: (level: string) => {
    base.level = resolveLevel(level);
  },
};
