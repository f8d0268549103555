export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  ts: number;
  level: Exclude<LogLevel, 'silent'>;
  scope: string;
  msg: string;
}

const LEVEL_ORDER: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];
const LOG_BUFFER_MAX = 2000;

export function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  const value = (raw || '').trim().toLowerCase();
  return LEVEL_ORDER.find(l => l === value) ?? fallback;
}

const stringify = (part: unknown): string => {
  if (typeof part === 'string') return part;
  if (part instanceof Error) return part.message;
  try {
    return JSON.stringify(part) ?? String(part);
  } catch {
    return String(part);
  }
};

/**
 * In-memory ring buffer of recent log lines, shown by the `/logs` command.
 * Keeps every entry, including the ones below the console level.
 */
export class LogBuffer {
  private entries: LogEntry[] = [];

  constructor(private readonly max = LOG_BUFFER_MAX) {}

  push(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.max) this.entries.splice(0, this.entries.length - this.max);
  }

  recent(limit = 500): LogEntry[] {
    if (limit <= 0) return [];
    return this.entries.slice(-Math.min(limit, this.entries.length));
  }

  clear(): void {
    this.entries.length = 0;
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * Scoped console logger. Children share the parent's buffer and follow its
 * level until they are given one of their own.
 */
export class Logger {
  private ownLevel?: LogLevel;

  constructor(
    readonly scope: string,
    level: LogLevel,
    readonly buffer: LogBuffer = new LogBuffer(),
    private readonly parent?: Logger
  ) {
    if (!parent) this.ownLevel = level;
  }

  get level(): LogLevel {
    return this.ownLevel ?? this.parent?.level ?? 'warn';
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.level, this.buffer, this);
  }

  setLevel(level: LogLevel): void {
    this.ownLevel = level;
  }

  trace(...parts: unknown[]): void { this.write('trace', parts); }
  debug(...parts: unknown[]): void { this.write('debug', parts); }
  info(...parts: unknown[]): void { this.write('info', parts); }
  warn(...parts: unknown[]): void { this.write('warn', parts); }
  error(...parts: unknown[]): void { this.write('error', parts); }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private write(level: LogEntry['level'], parts: unknown[]): void {
    const msg = parts.map(stringify).join(' ');
    this.buffer.push({ ts: Date.now(), level, scope: this.scope, msg });
    if (!this.shouldLog(level)) return;
    const fn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    fn(`[${this.scope}:${level}]`, msg);
  }
}

export function formatLogEntry(entry: LogEntry): string {
  return `${new Date(entry.ts).toISOString()} [${entry.scope}:${entry.level}] ${entry.msg}`;
}

export const rootLogger = new Logger('vision', parseLogLevel(process.env.OLLAMA_LOG_LEVEL, 'warn'));
