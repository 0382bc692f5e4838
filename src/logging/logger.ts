import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogMeta {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

export class Logger {
  private component: string;
  private level: LogLevel;

  constructor(component: string, level?: LogLevel) {
    this.component = component;
    const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
    this.level = level ?? (isLogLevel(fromEnv) ? fromEnv : 'info');
  }

  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.level);
  }

  private formatMessage(level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.component}] ${message}${metaStr}`;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled('debug')) {
      console.log(chalk.gray(this.formatMessage('debug', message, meta)));
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled('info')) {
      console.log(chalk.green(this.formatMessage('info', message, meta)));
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled('warn')) {
      console.warn(chalk.yellow(this.formatMessage('warn', message, meta)));
    }
  }

  error(message: string, meta?: LogMeta): void {
    if (this.enabled('error')) {
      console.error(chalk.red(this.formatMessage('error', message, meta)));
    }
  }
}

export function createLogger(component: string, level?: LogLevel): Logger {
  return new Logger(component, level);
}
