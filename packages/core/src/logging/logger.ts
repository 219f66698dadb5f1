export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: Exclude<LogLevel, 'silent'>;
  msg: string;
  [key: string]: unknown;
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Destination for formatted lines (default: stderr) */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function formatExtra(extra: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(extra)) {
    if (value === undefined) continue;
    parts.push(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  }
  return parts.length ? ` ${parts.join(' ')}` : '';
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.options.level ?? 'info';
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(
        level: Exclude<LogLevel, 'silent'>,
        msg: string,
        extra?: Record<string, unknown>
      ): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: Exclude<LogLevel, 'silent'>, msg: string, extra?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const record: LogRecord = {
      ...(extra ?? {}),
      ts: new Date().toISOString(),
      level,
      msg,
    };

    const write = this.options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

    if ((this.options.format ?? 'text') === 'json') {
      write(JSON.stringify(record));
      return;
    }

    write(`[${record.ts}] ${level.toUpperCase()} ${msg}${formatExtra(extra ?? {})}`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}
