/**
 * Logger utility for the coach overlap cross-reference
 *
 * Each module takes a scoped logger (`createLogger('batch')`) so lines from a
 * batch run say where they came from. Output goes to stdout unless the CLI
 * routes it to stderr to keep stdout free for JSON.
 */

import chalk from 'chalk';
import dayjs from 'dayjs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogStream = 'stdout' | 'stderr';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

const settings: { level: LogLevel; stream: LogStream } = {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  stream: 'stdout',
};

export function configureLogger(options: { level?: LogLevel; stream?: LogStream }): void {
  if (options.level) settings.level = options.level;
  if (options.stream) settings.stream = options.stream;
}

export function getLogLevel(): LogLevel {
  return settings.level;
}

function write(line: string, ...args: unknown[]): void {
  if (settings.stream === 'stderr') {
    console.error(line, ...args);
  } else {
    console.log(line, ...args);
  }
}

function formatTimestamp(): string {
  return dayjs().format('YYYY-MM-DD HH:mm:ss');
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[settings.level];
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  step(stepNumber: number, message: string): void;
  success(message: string): void;
  divider(): void;
}

export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[${scope}] ` : '';

  const emit = (level: LogLevel, color: (text: string) => string, message: string, args: unknown[]) => {
    if (shouldLog(level)) {
      write(color(`${formatTimestamp()} - ${level.toUpperCase()} - ${prefix}${message}`), ...args);
    }
  };

  return {
    debug: (message, ...args) => emit('debug', chalk.gray, message, args),
    info: (message, ...args) => emit('info', chalk.blue, message, args),
    warn: (message, ...args) => emit('warn', chalk.yellow, message, args),
    error: (message, ...args) => emit('error', chalk.red, message, args),

    // Styled output for CLI sections
    step(stepNumber, message) {
      write(chalk.cyan(`\nStep ${stepNumber}: ${message}`));
    },

    success(message) {
      write(chalk.green(`  ✓ ${message}`));
    },

    divider() {
      write(chalk.gray('═'.repeat(60)));
    },
  };
}

export const logger = createLogger();
