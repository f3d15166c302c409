export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMetadata = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function envLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") return level;
  return "info";
}

export class Logger {
  constructor(
    private readonly service: string,
    private readonly level: LogLevel = envLevel(),
    private readonly pretty: boolean = process.env.NODE_ENV !== "production"
  ) {}

  child(module: string): Logger {
    return new Logger(`${this.service}:${module}`, this.level, this.pretty);
  }

  debug(message: string, metadata?: LogMetadata) {
    if (this.enabled("debug")) console.debug(this.format("debug", message, metadata));
  }

  info(message: string, metadata?: LogMetadata) {
    if (this.enabled("info")) console.info(this.format("info", message, metadata));
  }

  warn(message: string, metadata?: LogMetadata) {
    if (this.enabled("warn")) console.warn(this.format("warn", message, metadata));
  }

  error(message: string, metadata?: LogMetadata) {
    if (this.enabled("error")) console.error(this.format("error", message, metadata));
  }

  private enabled(level: LogLevel) {
    return LEVELS[level] >= LEVELS[this.level];
  }

  private format(level: LogLevel, message: string, metadata?: LogMetadata) {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;
    if (this.pretty) {
      return `[${timestamp}] ${level.toUpperCase()} ${this.service}: ${message}${hasMeta ? ` ${JSON.stringify(metadata)}` : ""}`;
    }
    return JSON.stringify({ timestamp, level, service: this.service, message, ...(hasMeta ? metadata : {}) });
  }
}

export const logger = new Logger("civic");

export function createLogger(module: string): Logger {
  return logger.child(module);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
