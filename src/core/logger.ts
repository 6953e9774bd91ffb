// Centralized logging service for the city orchestrator

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown>;
}

/**
 * Receives formatted lines. The default sink writes to the console.
 */
export type LogSink = (level: LogLevel, line: string, entry: LogEntry) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.error(line);
  }
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[city]',
  timestamps: false
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT'
};

/**
 * Parse a level name from configuration or a CLI flag
 */
export function parseLogLevel(name: string): LogLevel {
  switch (name.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn':
    case 'warning': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'silent': return LogLevel.SILENT;
    default: return LogLevel.INFO;
  }
}

/**
 * Centralized logger with structured output
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Configure the singleton logger
   */
  static configure(config: Partial<LoggerConfig>): void {
    Logger.instance = new Logger(config);
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Create a logger for one component. `[city]` becomes `[city:supervisor]`.
   */
  child(component: string): Logger {
    const base = this.config.prefix ?? '';
    const prefix = base.endsWith(']')
      ? `${base.slice(0, -1)}:${component}]`
      : `[${component}]`;
    return new Logger({ ...this.config, prefix });
  }

  /**
   * Format a log message
   */
  private format(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${LEVEL_NAMES[entry.level]}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    return parts.join(' ');
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (this.config.level > level) {
      return;
    }
    const entry: LogEntry = { level, message, timestamp: new Date(), context };
    const sink = this.config.sink ?? consoleSink;
    sink(level, this.format(entry), entry);
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  /**
   * Log an info message
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, context);
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, context);
  }

  /**
   * Log an error message
   */
  error(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, context);
  }

  /**
   * Log an error with stack trace
   */
  exception(error: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.write(LogLevel.ERROR, error.message, {
        ...context,
        name: error.name,
        stack: error.stack
      });
      return;
    }
    this.write(LogLevel.ERROR, String(error), context);
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
