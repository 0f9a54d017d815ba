export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVELS, value);
}

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context?: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export type Transport = (entry: LogEntry) => void;

export class Logger {
  private transports: Transport[] = [];
  private level: LogLevel;
  private context?: string;

  constructor(opts?: { level?: LogLevel; context?: string }) {
    this.level = opts?.level ?? 'info';
    this.context = opts?.context;
  }

  /** A logger with no transports; used where a component's caller passes none. */
  static silent(): Logger {
    return new Logger({ level: 'silent' });
  }

  addTransport(transport: Transport): this {
    this.transports.push(transport);
    return this;
  }

  setLevel(level: LogLevel): this {
    this.level = level;
    return this;
  }

  child(context: string): Logger {
    const child = new Logger({
      level: this.level,
      context: this.context ? `${this.context}.${context}` : context,
    });
    child.transports = this.transports;
    return child;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogEntry['level'], message: string, data?: Record<string, unknown>): void {
    if (LEVELS[level] < LEVELS[this.level]) return;
    const entry: LogEntry = {
      level,
      message,
      context: this.context,
      timestamp: new Date().toISOString(),
      data,
    };
    for (const t of this.transports) {
      t(entry);
    }
  }
}

export function formatEntry(entry: LogEntry): string {
  const prefix = entry.context ? ` [${entry.context}]` : '';
  const data = entry.data && Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
  return `${entry.timestamp} ${entry.level.toUpperCase()}${prefix} ${entry.message}${data}`;
}

/** stdout stays reserved for command output and hook responses. */
export function stderrTransport(entry: LogEntry): void {
  process.stderr.write(formatEntry(entry) + '\n');
}
