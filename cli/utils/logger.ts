export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  meta?: Record<string, unknown>;
}

// Looked up on every call so console methods can be replaced at runtime
const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * `[timestamp] [LEVEL] [scope] message {"meta":"as json"}`
 */
export function formatLogEntry(entry: LogEntry): string {
  const scope = entry.scope ? ` [${entry.scope}]` : '';
  const meta = entry.meta ? ` ${JSON.stringify(entry.meta)}` : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}]${scope} ${entry.message}${meta}`;
}

export interface LoggerState {
  minLevel: LogLevel;
}

export class Logger {
  constructor(
    private readonly state: LoggerState,
    private readonly scope?: string
  ) {}

  /**
   * Logger tagged with a component name; shares the minimum level with its parent
   */
  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  setLevel(level: LogLevel): void {
    this.state.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.state.minLevel;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.state.minLevel);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    WRITERS[level](
      formatLogEntry({
        level,
        message,
        timestamp: new Date().toISOString(),
        scope: this.scope,
        meta,
      })
    );
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }
}

export const logger = new Logger({ minLevel: 'info' });
