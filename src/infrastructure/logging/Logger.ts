/**
 * Structured Logger
 *
 * Levelled, categorised logging for the capture engine. Loggers resolve the
 * global configuration on every call, so module-level loggers pick up
 * `setGlobalLoggerConfig` changes made after they were created.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  context?: LogContext;
}

export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  minLevel: LogLevel;
  /** Whether to include timestamps (default: false) */
  includeTimestamp: boolean;
  /** Whether to use colors in console output (default: true) */
  useColors: boolean;
  /** Whether to output as JSON (default: false) */
  jsonOutput: boolean;
  /** Custom log handler */
  customHandler?: (entry: LogEntry) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const CATEGORY_COLORS: Record<string, string> = {
  Capture: '\x1b[35m',
  Executor: '\x1b[32m',
  Resolver: '\x1b[34m',
  Signature: '\x1b[90m',
  Browser: '\x1b[36m',
  Evidence: '\x1b[33m',
  Planner: '\x1b[34m',
  Repository: '\x1b[90m',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  includeTimestamp: false,
  useColors: true,
  jsonOutput: false,
};

let globalConfig: Partial<LoggerConfig> = {};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Structured logger with levels and categories.
 */
export class Logger {
  private overrides: Partial<LoggerConfig>;
  private readonly category: string;

  constructor(category: string, config: Partial<LoggerConfig> = {}) {
    this.category = category;
    this.overrides = { ...config };
  }

  get name(): string {
    return this.category;
  }

  setLevel(level: LogLevel): void {
    this.overrides = { ...this.overrides, minLevel: level };
  }

  private get config(): LoggerConfig {
    return { ...DEFAULT_CONFIG, ...globalConfig, ...this.overrides };
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const config = this.config;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category: this.category,
      message,
      context,
    };

    if (config.customHandler) {
      config.customHandler(entry);
      return;
    }

    if (config.jsonOutput) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(entry));
    } else {
      this.outputText(entry, config);
    }
  }

  private outputText(entry: LogEntry, config: LoggerConfig): void {
    const parts: string[] = [];
    const paint = (color: string, text: string): string =>
      config.useColors ? `${color}${text}${RESET}` : text;

    if (config.includeTimestamp) {
      parts.push(paint(DIM, entry.timestamp.slice(11, 19)));
    }

    parts.push(paint(CATEGORY_COLORS[entry.category.split(':')[0]] ?? '\x1b[37m', `[${entry.category}]`));
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      const contextStr = Object.entries(entry.context)
        .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
        .join(' ');
      parts.push(paint(DIM, `(${contextStr})`));
    }

    const output = parts.join(' ');

    switch (entry.level) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(paint(LOG_COLORS.error, output));
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(paint(LOG_COLORS.warn, output));
        break;
      default:
        // eslint-disable-next-line no-console
        console.log(output);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Create a child logger with a sub-category. The child shares this
   * logger's overrides.
   */
  child(subCategory: string): Logger {
    return new Logger(`${this.category}:${subCategory}`, this.overrides);
  }
}

export function setGlobalLoggerConfig(config: Partial<LoggerConfig>): void {
  globalConfig = { ...config };
}

export function getLogger(category: string): Logger {
  return new Logger(category);
}
