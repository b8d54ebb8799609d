import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

class Logger {
  constructor(private readonly scope?: string) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[currentLevel];
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString().slice(11, 19);
    const prefix = chalk.dim(`[${timestamp}]`);
    const scope = this.scope ? chalk.dim(`${this.scope}: `) : '';

    switch (level) {
      case 'debug':
        return `${prefix} ${chalk.gray('DEBUG')} ${scope}${message}`;
      case 'info':
        return `${prefix} ${chalk.blue('INFO')} ${scope}${message}`;
      case 'warn':
        return `${prefix} ${chalk.yellow('WARN')} ${scope}${message}`;
      case 'error':
        return `${prefix} ${chalk.red('ERROR')} ${scope}${message}`;
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(this.formatMessage('debug', message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message), ...args);
    }
  }
}

export type { Logger };

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}

export const logger = new Logger();
