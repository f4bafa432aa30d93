/**
 * Structured logging for reconcilers
 *
 * Human-readable or JSON lines. Everything goes to stderr: stdout is reserved
 * for command results (`--json`).
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Context merged into every entry */
  context?: Record<string, unknown>;
  /** Line sink (default: stderr) */
  write?: (line: string) => void;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Narrow an arbitrary string (e.g. from the environment) to a LogLevel
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const lower = value?.toLowerCase();
  return isLogLevel(lower) ? lower : undefined;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly timestamps: boolean;
  private readonly context: Record<string, unknown>;
  private readonly write: (line: string) => void;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? 'info';
    this.json = config.json ?? false;
    this.timestamps = config.timestamps ?? true;
    this.context = config.context ?? {};
    this.write = config.write ?? ((line) => process.stderr.write(line + '\n'));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const merged = { ...this.context, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = { name: error.name, message: error.message };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  private formatEntry(entry: LogEntry): string {
    if (this.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;
    this.write(this.formatEntry(this.createEntry(level, message, context, error)));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      json: this.json,
      timestamps: this.timestamps,
      context: { ...this.context, ...context },
      write: this.write,
    });
  }
}

// =============================================================================
// Shared Instances
// =============================================================================

/**
 * Logger that drops everything (tests, --json without --verbose)
 */
export const silentLogger = new Logger({ write: () => {} });

export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}
