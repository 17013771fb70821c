/**
 * Structured Logging Utility
 * Colorized logger that writes every level to stderr.
 * stdout is reserved for MCP stdio frames and must never carry log lines.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const levelColors: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.gray,
  [LogLevel.INFO]: colors.blue,
  [LogLevel.WARN]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
};

const levelPriority: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export type LogMeta = Record<string, unknown>;

interface LoggerConfig {
  level: LogLevel;
  enableColors: boolean;
  enableTimestamp: boolean;
}

function parseLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case LogLevel.DEBUG:
      return LogLevel.DEBUG;
    case LogLevel.WARN:
      return LogLevel.WARN;
    case LogLevel.ERROR:
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

class Logger {
  private config: LoggerConfig = {
    level: parseLevel(process.env.LOG_LEVEL),
    enableColors: process.env.NODE_ENV !== 'production',
    enableTimestamp: true,
  };

  private colorize(text: string, color: string): string {
    if (!this.config.enableColors) {
      return text;
    }
    return `${color}${text}${colors.reset}`;
  }

  /**
   * Format log message
   */
  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const parts: string[] = [];

    if (this.config.enableTimestamp) {
      parts.push(this.colorize(new Date().toISOString(), colors.gray));
    }

    parts.push(this.colorize(level.toUpperCase().padEnd(5), levelColors[level]));
    parts.push(message);

    if (meta && Object.keys(meta).length > 0) {
      parts.push(this.colorize(JSON.stringify(meta), colors.gray));
    }

    return parts.join(' ');
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.config.level];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) {
      return;
    }

    console.error(this.formatMessage(level, message, meta));
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  /**
   * Error level logging. An Error is flattened to name, message and stack;
   * a `cause` on it is recorded by message.
   */
  error(message: string, error?: Error | LogMeta): void {
    const meta: LogMeta = {};

    if (error instanceof Error) {
      meta.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        ...(error.cause instanceof Error ? { cause: error.cause.message } : {}),
      };
    } else if (error) {
      Object.assign(meta, error);
    }

    this.log(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setColors(enabled: boolean): void {
    this.config.enableColors = enabled;
  }

  setTimestamps(enabled: boolean): void {
    this.config.enableTimestamp = enabled;
  }
}

// Export singleton instance
export const logger = new Logger();

// Export for testing
export { Logger };
