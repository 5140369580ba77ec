import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

let defaultLevel: LogLevel = parseLevel(process.env.QGATE_LOG_LEVEL) ?? 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

/** Changes the level of every logger created without an explicit one. */
export function setLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

/**
 * Console logger with a per-component context. Writes to stderr so that
 * machine-readable results on stdout stay clean.
 */
export class Logger {
  constructor(private context: string, private minLevel?: LogLevel) {}

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel ?? defaultLevel];
  }

  private timestamp(): string {
    return new Date().toISOString().slice(11, 19);
  }

  private format(level: Exclude<LogLevel, 'silent'>, message: string): string {
    const colors: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
      debug: chalk.gray,
      info: chalk.blue,
      warn: chalk.yellow,
      error: chalk.red,
    };
    return `${chalk.gray(`[${this.timestamp()}]`)} ${colors[level](`[${this.context}]`)} ${message}`;
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) console.error(this.format('debug', message));
  }

  info(message: string): void {
    if (this.shouldLog('info')) console.error(this.format('info', message));
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) console.error(this.format('warn', `⚠ ${message}`));
  }

  error(message: string): void {
    if (this.shouldLog('error')) console.error(this.format('error', `✗ ${message}`));
  }

  success(message: string): void {
    if (this.shouldLog('info')) console.error(this.format('info', chalk.green(`✓ ${message}`)));
  }
}
