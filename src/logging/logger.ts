export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: string;
  readonly timestamp: string;
  readonly data?: Record<string, unknown>;
}

export type Transport = (entry: LogEntry) => void;

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly context?: string;
}

export class Logger {
  private transports: Transport[] = [];
  private readonly level: LogLevel;
  private readonly context?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context;
  }

  addTransport(transport: Transport): this {
    this.transports.push(transport);
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
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVELS[level] < LEVELS[this.level]) {
      return;
    }
    const entry: LogEntry = {
      level,
      message,
      context: this.context,
      timestamp: new Date().toISOString(),
      data,
    };
    for (const transport of this.transports) {
      transport(entry);
    }
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVELS, value);
}

export function stderrTransport(entry: LogEntry): void {
  const prefix = entry.context ? ` [${entry.context}]` : "";
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
  process.stderr.write(
    `${entry.timestamp} ${entry.level.toUpperCase()}${prefix} ${entry.message}${data}\n`,
  );
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options).addTransport(stderrTransport);
}
