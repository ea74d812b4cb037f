/**
 * Structured logging for loader diagnostics.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'json' | 'text';

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVELS, value);
}

export class Logger {
  private _name: string;
  private _format: LogFormat;
  private _level: LogLevel;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;

  constructor(options?: LoggerOptions) {
    this._name = options?.name ?? 'packloader';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level];
    this._redactSensitive = options?.redactSensitive ?? true;
    // stderr keeps stdout free for hosts that print listings
    this._output = options?.output ?? { write: (s: string) => process.stderr.write(s) };
  }

  get name(): string {
    return this._name;
  }

  get level(): LogLevel {
    return this._level;
  }

  /** Logger sharing this one's settings under `<name>.<suffix>`. */
  child(suffix: string): Logger {
    return new Logger({
      name: `${this._name}.${suffix}`,
      format: this._format,
      level: this._level,
      redactSensitive: this._redactSensitive,
      output: this._output,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= this._levelValue;
  }

  private _emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    let redactedExtra: Record<string, unknown> | null = extra ?? null;
    if (extra !== undefined && this._redactSensitive) {
      redactedExtra = {};
      for (const [k, v] of Object.entries(extra)) {
        redactedExtra[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level,
        message,
        logger: this._name,
        extra: redactedExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      let extrasStr = '';
      if (redactedExtra) {
        extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ');
      }
      this._output.write(`${ts} [${level.toUpperCase()}] [${this._name}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

function formatValue(v: unknown): string {
  if (Array.isArray(v)) return v.join(',');
  if (v !== null && typeof v === 'object') return JSON.stringify(v);
  return String(v);
}

let _defaultLogger: Logger | null = null;

/** Shared fallback logger used when a caller supplies none. */
export function defaultLogger(): Logger {
  if (_defaultLogger === null) {
    _defaultLogger = new Logger();
  }
  return _defaultLogger;
}
