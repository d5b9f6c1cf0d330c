/**
 * Minimal structured logger. Matches the interface stages expect
 * (service + method prefix, structured context + message). Any object with
 * the same optional methods (pino, bole, console) can be passed instead.
 */

export type LogMethod = (ctx: Record<string, unknown>, msg: string) => void;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
  /** Child logger for a named component. */
  get?(name: string): Logger;
}

/** Either a Logger or something with get(name) returning one. */
export type LoggerFactory = Logger;

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Resolve logger from factory (supports loggerFactory or loggerFactory.get(SERVICE_NAME)). */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  return factory?.get?.(serviceName) ?? factory ?? console;
}

function write(level: LogLevel, ctx: Record<string, unknown>, msg: string): void {
  const payload = Object.keys(ctx).length ? { ...ctx, msg } : { msg };
  const line = JSON.stringify({ level, time: Date.now(), ...payload });
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

function parseLevel(value: string | undefined): LogLevel {
  return value === "debug" || value === "warn" || value === "error" ? value : "info";
}

/**
 * Create a node-style logger factory writing one JSON line per entry.
 * get(prefix) returns a logger tagged with that prefix. The minimum level
 * comes from `level`, then LOG_LEVEL, then "info".
 */
export function createNodeJSLogger(
  serviceName: string,
  options: { level?: LogLevel } = {}
): Logger & { get(prefix: string): Logger } {
  const min = LEVELS[options.level ?? parseLevel(process.env.LOG_LEVEL)];

  const make = (prefix: string): Logger => {
    const method = (level: LogLevel): LogMethod | undefined =>
      LEVELS[level] >= min
        ? (ctx, msg) => write(level, { ...ctx, service: serviceName, prefix }, msg)
        : undefined;
    return {
      debug: method("debug"),
      info: method("info"),
      warn: method("warn"),
      error: method("error"),
      get: (name: string) => make(name),
    };
  };

  const root = make(serviceName);
  return { ...root, get: (prefix: string) => make(prefix) };
}
