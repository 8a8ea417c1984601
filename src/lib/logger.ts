const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  tag: string;
  message: string;
  args?: unknown[];
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

class Logger {
  private currentLogLevel: LogLevel = 'info';
  private logLevelPriority: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  private useColors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

  constructor() {
    const envLevel = process.env.LOG_LEVEL;
    if (isLogLevel(envLevel)) {
      this.currentLogLevel = envLevel;
    }
  }

  setLogLevel(level: LogLevel): void {
    this.currentLogLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.currentLogLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.logLevelPriority[level] >= this.logLevelPriority[this.currentLogLevel];
  }

  private getTimestamp() {
    return new Date().toISOString().replace('T', ' ').replace('Z', '');
  }

  private entry(level: LogLevel, tag: string, message: string, args: unknown[]): LogEntry {
    return {
      timestamp: this.getTimestamp(),
      level,
      tag,
      message,
      args: args.length > 0 ? args : undefined
    };
  }

  private paint(color: string, text: string): string {
    return this.useColors ? `${color}${text}${COLORS.reset}` : text;
  }

  private formatConsole(entry: LogEntry): unknown[] {
    let levelColor = COLORS.reset;
    switch (entry.level) {
      case 'debug': levelColor = COLORS.blue; break;
      case 'info': levelColor = COLORS.green; break;
      case 'warn': levelColor = COLORS.yellow; break;
      case 'error': levelColor = COLORS.red; break;
    }

    const timestamp = this.paint(COLORS.dim, entry.timestamp);
    const level = this.paint(levelColor, entry.level.toUpperCase().padEnd(5));
    const tag = this.paint(COLORS.magenta, `[${entry.tag}]`);

    return [`${timestamp} ${level} ${tag} ${entry.message}`, ...(entry.args || [])];
  }

  debug(tag: string, message: string, ...args: unknown[]) {
    if (!this.shouldLog('debug')) return;
    console.debug(...this.formatConsole(this.entry('debug', tag, message, args)));
  }

  info(tag: string, message: string, ...args: unknown[]) {
    if (!this.shouldLog('info')) return;
    console.info(...this.formatConsole(this.entry('info', tag, message, args)));
  }

  warn(tag: string, message: string, ...args: unknown[]) {
    if (!this.shouldLog('warn')) return;
    console.warn(...this.formatConsole(this.entry('warn', tag, message, args)));
  }

  error(tag: string, message: string, ...args: unknown[]) {
    // Always log errors
    console.error(...this.formatConsole(this.entry('error', tag, message, args)));
  }
}

export const logger = new Logger();
