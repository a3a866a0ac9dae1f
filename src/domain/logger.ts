/**
 * Structured JSON logger for the Skycast weather server
 *
 * IMPORTANT: All logs go to stderr because stdout is reserved for MCP protocol communication
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

// Only these input fields are ever copied into a log line
const SAFE_INPUT_FIELDS = ['nick', 'location'];

class Logger {
  private minLevel: LogLevel;
  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  /**
   * Set minimum log level
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.minLevel];
  }

  /**
   * Write a log entry to stderr
   */
  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    console.error(JSON.stringify(entry));
  }

  /**
   * Log debug message
   */
  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  /**
   * Log info message
   */
  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  /**
   * Log warning message
   */
  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  /**
   * Log error message
   */
  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Log an error object with stack trace
   */
  logError(error: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      this.error(error.message, {
        ...context,
        errorName: error.name,
        stack: error.stack,
      });
      return;
    }
    this.error(String(error), context);
  }

  /**
   * Log command invocation start
   */
  logCommandStart(commandName: string, input: unknown, requestId?: string): void {
    this.info('Command started', {
      requestId,
      commandName,
      inputSummary: this.sanitizeInput(input),
    });
  }

  /**
   * Log command invocation completion
   */
  logCommandEnd(
    commandName: string,
    latencyMs: number,
    outcome: 'success' | 'error',
    requestId?: string,
    errorKind?: string
  ): void {
    this.info('Command completed', {
      requestId,
      commandName,
      latencyMs,
      outcome,
      ...(errorKind && { errorKind }),
    });
  }

  /**
   * Log an upstream API call. Only the provider label and host are logged,
   * since both providers carry the API key in the URL.
   */
  logUpstreamCall(
    provider: string,
    host: string,
    upstreamStatus: number,
    latencyMs: number,
    requestId?: string
  ): void {
    this.debug('Upstream API call', {
      requestId,
      provider,
      host,
      upstreamStatus,
      latencyMs,
    });
  }

  /**
   * Keep only the safe input fields for logging
   */
  private sanitizeInput(input: unknown): Record<string, unknown> {
    if (typeof input !== 'object' || input === null) {
      return { type: typeof input };
    }

    const summary: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(input)) {
      if (SAFE_INPUT_FIELDS.includes(field)) {
        summary[field] = value;
      }
    }

    return summary;
  }
}

// Singleton logger instance
const logger = new Logger();

export { logger };
