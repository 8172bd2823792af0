import type { LogLevel } from '@/types/logLevel';

export type { LogLevel } from '@/types/logLevel';

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scopes: readonly string[];
  message: string;
  context: LogContext;
}

const SEVERITY: Record<LogLevel, number> = {
  spam: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: 100,
};

/** Levels written to stderr; everything else goes to stdout. */
const STDERR_LEVELS: ReadonlySet<LogLevel> = new Set<LogLevel>(['warn', 'error']);

function renderValue(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (Buffer.isBuffer(value)) return value.toString('hex');
  if (typeof value === 'string') {
    if (value.length === 0) return '""';
    return /[\s"\\[\]]/.test(value) ? JSON.stringify(value) : value;
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

function renderText(entry: LogEntry): string {
  const fields = Object.keys(entry.context)
    .sort()
    .map((key) => `${key}=${renderValue(entry.context[key])}`);
  const context = fields.length ? ` [${fields.join(' ')}]` : '';
  return `[${entry.timestamp}][${entry.level.toUpperCase()}][${entry.scopes.join('|')}]${context} ${entry.message}`;
}

function renderJson(entry: LogEntry): string {
  const context = Object.fromEntries(
    Object.entries(entry.context).map(([key, value]) => [
      key,
      Buffer.isBuffer(value) ? value.toString('hex') : value,
    ]),
  );
  return JSON.stringify({ ...entry, context });
}

/**
 * Process-wide sink shared by every {@link ComponentLogger}.
 */
class LogManager {
  private level: LogLevel = 'info';
  private json = false;
  private stdout: NodeJS.WritableStream = process.stdout;
  private stderr: NodeJS.WritableStream = process.stderr;

  public configure(options: LoggerOptions): void {
    this.level = options.level ?? this.level;
    this.json = options.json ?? this.json;
    this.stdout = options.stdout ?? this.stdout;
    this.stderr = options.stderr ?? this.stderr;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  public emit(level: LogLevel, scopes: readonly string[], message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      scopes,
      message,
      context: context ?? {},
    };
    const line = this.json ? renderJson(entry) : renderText(entry);
    const stream = STDERR_LEVELS.has(level) ? this.stderr : this.stdout;
    stream.write(`${line}\n`);
  }
}

export const logManager = new LogManager();

export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return new ComponentLogger([component, ...scopes]);
}

/**
 * Logger bound to a scope path such as `Speakers|left`. Configuration lives
 * on {@link logManager}, so loggers created before `configure()` follow it.
 */
export class ComponentLogger {
  constructor(private readonly scopes: readonly string[]) {}

  public child(scope: string): ComponentLogger {
    return new ComponentLogger([...this.scopes, scope]);
  }

  public spam(message: string, context?: LogContext): void {
    logManager.emit('spam', this.scopes, message, context);
  }

  public debug(message: string, context?: LogContext): void {
    logManager.emit('debug', this.scopes, message, context);
  }

  public info(message: string, context?: LogContext): void {
    logManager.emit('info', this.scopes, message, context);
  }

  public warn(message: string, context?: LogContext): void {
    logManager.emit('warn', this.scopes, message, context);
  }

  public error(message: string, context?: LogContext): void {
    logManager.emit('error', this.scopes, message, context);
  }
}
