import pc from 'picocolors';
import { scrubSecrets } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';
export type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const PRETTY_LEVELS: Record<LogLevel, string> = {
  debug: pc.dim('DEBUG'),
  info: pc.green(' INFO'),
  warn: pc.yellow(' WARN'),
  error: pc.red('ERROR'),
};

interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  now: () => Date;
}

/** Parse a LOG_LEVEL value, falling back when unset or unknown */
export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return fallback;
}

/**
 * Leveled logger writing one line per entry to stdout (stderr for warnings and errors).
 * Child loggers share the root's settings, so `configure` on the root applies everywhere.
 */
export class Logger {
  private readonly settings: LoggerSettings;
  private readonly fields: LogFields;

  constructor(settings: LoggerSettings, fields: LogFields = {}) {
    this.settings = settings;
    this.fields = fields;
  }

  configure(options: Partial<LoggerSettings>): void {
    Object.assign(this.settings, options);
  }

  child(fields: LogFields): Logger {
    return new Logger(this.settings, { ...this.fields, ...fields });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.settings.level];
  }

  debug(msg: string, fields?: LogFields): void {
    this.write('debug', msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write('info', msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write('warn', msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write('error', msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) return;

    const merged = { ...this.fields, ...fields };
    const time = this.settings.now().toISOString();
    const line =
      this.settings.format === 'json'
        ? JSON.stringify({ level, time, msg, ...merged })
        : formatPretty(level, time, msg, merged);

    const safe = scrubSecrets(line);
    if (level === 'warn' || level === 'error') {
      console.error(safe);
    } else {
      console.log(safe);
    }
  }
}

function formatPretty(level: LogLevel, time: string, msg: string, fields: LogFields): string {
  let line = `${pc.dim(time)} ${PRETTY_LEVELS[level]} ${msg}`;
  for (const [key, value] of Object.entries(fields)) {
    const rendered = typeof value === 'string' ? value : JSON.stringify(value);
    line += ` ${pc.cyan(key)}=${rendered}`;
  }
  return line;
}

/**
 * Create a root logger.
 */
export function createLogger(options: Partial<LoggerSettings> = {}): Logger {
  return new Logger({
    level: options.level ?? 'info',
    format: options.format ?? 'json',
    now: options.now ?? (() => new Date()),
  });
}

/** Process-wide logger; the server entry point configures its format at startup */
export const logger = createLogger({
  level: parseLogLevel(process.env.LOG_LEVEL, 'debug'),
});
