import chalk from 'chalk';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_LABELS: Record<LogLevelName, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan(' INFO'),
  warn: chalk.yellow(' WARN'),
  error: chalk.red('ERROR'),
};

let threshold: LogLevelName = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

export function parseLogLevel(value?: string): LogLevelName | undefined {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error'
  ) {
    return normalized;
  }

  return undefined;
}

export function setLogLevel(level: LogLevelName): void {
  threshold = level;
}

export function getLogLevel(): LogLevelName {
  return threshold;
}

export class Logger {
  constructor(private readonly name: string) {}

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  isEnabled(level: LogLevelName): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  private write(level: LogLevelName, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = chalk.dim(new Date().toISOString());
    const prefix = `${timestamp} ${LEVEL_LABELS[level]} ${chalk.bold(`[${this.name}]`)}`;

    if (level === 'error') {
      console.error(prefix, message, ...args);
    } else if (level === 'warn') {
      console.warn(prefix, message, ...args);
    } else {
      console.log(prefix, message, ...args);
    }
  }
}

const loggers = new Map<string, Logger>();

export function createLogger(name: string): Logger {
  let logger = loggers.get(name);
  if (!logger) {
    logger = new Logger(name);
    loggers.set(name, logger);
  }
  return logger;
}
