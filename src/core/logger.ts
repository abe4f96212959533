/**
 * Console logger with level filtering. Writes to stderr so plans on stdout stay parseable.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export type LogSink = (line: string) => void;

const PREFIXES: Record<LogLevel, string> = {
  debug: chalk.gray('[debug]'),
  info: chalk.cyan('[info] '),
  warn: chalk.yellow('[warn] '),
  error: chalk.red('[error]'),
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((entry) => entry === value);
}

export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly sink: LogSink;

  constructor(level: LogLevel = 'warn', sink: LogSink = (line) => console.error(line)) {
    this.level = level;
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
    let formatted = `${PREFIXES[level]} ${message}`;

    if (meta instanceof Error) {
      // JSON.stringify(new Error()) is {}
      formatted += `\n${JSON.stringify({ name: meta.name, message: meta.message, stack: meta.stack }, null, 2)}`;
    } else if (meta !== undefined && typeof meta === 'object' && meta !== null) {
      formatted += `\n${JSON.stringify(meta, null, 2)}`;
    } else if (meta !== undefined) {
      formatted += ` ${String(meta)}`;
    }

    return formatted;
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (this.shouldLog(level)) {
      this.sink(this.formatMessage(level, message, meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  const explicit = env.BUILDGRAPH_LOG_LEVEL;
  if (explicit && isLogLevel(explicit)) return explicit;
  return env.BUILDGRAPH_VERBOSE === '1' ? 'debug' : 'warn';
}

// Shared instance; the CLI adjusts its level once configuration is loaded.
export const logger = new ConsoleLogger(levelFromEnv(process.env));
