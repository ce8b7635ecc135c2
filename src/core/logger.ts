import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogSink {
  write(line: string): void;
  readonly isTTY?: boolean;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  scope?: string;
}

const levelStyles: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const levelMarks: Record<LogLevel, string> = {
  debug: '·',
  info: 'ℹ',
  warn: '⚠',
  error: '✗',
};

export const stderrSink: LogSink = {
  write: (line) => {
    process.stderr.write(`${line}\n`);
  },
  get isTTY() {
    return process.stderr.isTTY === true;
  },
};

export class Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly scope: string | undefined;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? stderrSink;
    this.scope = options.scope;
  }

  /**
   * Logger that shares level and sink but prefixes lines with a scope name
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const colorize = this.sink.isTTY === true;
    const mark = colorize ? levelStyles[level](levelMarks[level]) : levelMarks[level];
    const scope = this.scope ? (colorize ? chalk.dim(`[${this.scope}]`) : `[${this.scope}]`) : '';
    const detail = formatFields(fields);

    const parts = [mark, level.toUpperCase()];
    if (scope) parts.push(scope);
    parts.push(message);
    if (detail) parts.push(colorize ? chalk.gray(detail) : detail);

    this.sink.write(parts.join(' '));
  }
}

function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' && /\s/.test(value) ? JSON.stringify(value) : String(value)}`)
    .join(' ');
}

// Sink that keeps lines in memory, for tests and embedding hosts.
export class MemorySink implements LogSink {
  readonly lines: string[] = [];
  readonly isTTY = false;

  write(line: string): void {
    this.lines.push(line);
  }
}

export const silentLogger = new Logger({ sink: { write: () => undefined } });
