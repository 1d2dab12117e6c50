export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level?: string;
  jsonFormat?: boolean;
}

export interface RequestLogInfo {
  method: string;
  url: string;
  statusCode: number;
  ip?: string;
  userAgent?: string;
  correlationId?: string;
}

const REDACTED = "[REDACTED]";
const SENSITIVE_KEY = /password|passwordhash|token|secret|authorization/i;

/**
 * Replace the values of credential-bearing keys before anything reaches the
 * console. Nested objects and arrays are walked.
 */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (value instanceof Date || value instanceof Error) {
    return value;
  }
  if (value !== null && typeof value === "object") {
    const result: LogMeta = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) ? REDACTED : redact(inner);
    }
    return result;
  }
  return value;
}

class Logger {
  private level: LogLevel = LogLevel.INFO;
  private jsonFormat = false;

  configure(options: LoggerOptions): void {
    if (options.level !== undefined) {
      this.level = this.parseLogLevel(options.level);
    }
    if (options.jsonFormat !== undefined) {
      this.jsonFormat = options.jsonFormat;
    }
  }

  private parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase()) {
      case "error":
        return LogLevel.ERROR;
      case "warn":
        return LogLevel.WARN;
      case "info":
        return LogLevel.INFO;
      case "debug":
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.level;
  }

  formatMessage(level: string, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    const safeMeta = meta ? redact(meta) : undefined;

    if (this.jsonFormat) {
      return JSON.stringify({ timestamp, level, message, ...(safeMeta ?? {}) });
    }

    const metaStr = safeMeta ? ` ${JSON.stringify(safeMeta)}` : "";
    return `[${timestamp}] ${level}: ${message}${metaStr}`;
  }

  error(message: string, meta?: LogMeta): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage("ERROR", message, meta));
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage("WARN", message, meta));
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage("INFO", message, meta));
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(this.formatMessage("DEBUG", message, meta));
    }
  }

  // Specialized logging methods
  logRequest(info: RequestLogInfo, responseTime: number): void {
    this.info("Request completed", {
      method: info.method,
      url: info.url,
      statusCode: info.statusCode,
      responseTime: `${responseTime}ms`,
      ip: info.ip,
      userAgent: info.userAgent,
      correlationId: info.correlationId,
    });
  }

  logError(error: Error, context: LogMeta = {}): void {
    this.error("Error occurred", {
      error: error.message,
      stack: error.stack,
      ...context,
    });
  }

  logAudit(
    action: string,
    organization: string,
    details: LogMeta = {},
  ): void {
    this.info("Audit log entry", {
      action,
      organization,
      ...details,
    });
  }
}

export const logger = new Logger();
