export interface Logger {
  debug(tag: string, msg: string, ...args: unknown[]): void;
  info(tag: string, msg: string, ...args: unknown[]): void;
  warn(tag: string, msg: string, ...args: unknown[]): void;
  error(tag: string, msg: string, ...args: unknown[]): void;
}

export type LogLevel = keyof Logger;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const consoleLogger: Logger = {
  debug(tag, msg, ...args) {
    console.debug(`[${tag}]`, msg, ...args);
  },
  info(tag, msg, ...args) {
    console.info(`[${tag}]`, msg, ...args);
  },
  warn(tag, msg, ...args) {
    console.warn(`[${tag}]`, msg, ...args);
  },
  error(tag, msg, ...args) {
    console.error(`[${tag}]`, msg, ...args);
  },
};

export let log: Logger = consoleLogger;

export function setLogger(logger: Logger): void {
  log = logger;
}

/** `2025-01-31 09:05:07` in local time. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  return typeof arg === "string" ? arg : String(arg);
}

export function formatLine(level: LogLevel, tag: string, msg: string, args: unknown[], now: Date): string {
  const extra = args.length > 0 ? " " + args.map(formatArg).join(" ") : "";
  return `${formatTimestamp(now)} ${level.toUpperCase().padEnd(5)} [${tag}] ${msg}${extra}`;
}

export interface TimestampedLoggerOptions {
  minLevel?: LogLevel | undefined;
  write?: ((level: LogLevel, line: string) => void) | undefined;
  now?: (() => Date) | undefined;
}

/**
 * Line-per-event logger used by the CLI. Warnings and errors go to stderr,
 * everything else to stdout.
 */
export function createTimestampedLogger(options: TimestampedLoggerOptions = {}): Logger {
  const minLevel = options.minLevel ?? "info";
  const now = options.now ?? (() => new Date());
  const write = options.write ?? ((level: LogLevel, line: string) => {
    const stream = level === "warn" || level === "error" ? process.stderr : process.stdout;
    stream.write(line + "\n");
  });

  const emit = (level: LogLevel, tag: string, msg: string, args: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    write(level, formatLine(level, tag, msg, args, now()));
  };

  return {
    debug(tag, msg, ...args) { emit("debug", tag, msg, args); },
    info(tag, msg, ...args) { emit("info", tag, msg, args); },
    warn(tag, msg, ...args) { emit("warn", tag, msg, args); },
    error(tag, msg, ...args) { emit("error", tag, msg, args); },
  };
}
