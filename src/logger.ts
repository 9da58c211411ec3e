type LogMethod = (message: string, ...args: unknown[]) => void;

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function parseBooleanEnv(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (parseBooleanEnv(env.SATHUB_DEBUG)) {
    return "debug";
  }
  const configured = env.SATHUB_LOG_LEVEL?.trim().toLowerCase();
  if (configured) {
    if (configured === "trace" || configured === "verbose") {
      return "debug";
    }
    if (isLogLevel(configured)) {
      return configured;
    }
  }
  return "info";
}

/**
 * Receives every emitted line, already prefixed with the namespace
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface HubLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  /** Defaults to true. stdout is reserved for the MCP transport, so lines go to stderr. */
  console?: boolean;
}

function renderArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export function createLogger(namespace: string, options: LoggerOptions = {}): HubLogger {
  const prefix = `[${namespace}]`;
  const threshold = options.level ?? resolveLogLevel();
  const toConsole = options.console ?? true;

  const wrap = (level: LogLevel): LogMethod => {
    return (message: string, ...args: unknown[]) => {
      if (LEVEL_WEIGHT[level] > LEVEL_WEIGHT[threshold]) {
        return;
      }
      const line = `${prefix} ${message}`;
      if (toConsole) {
        console.error(line, ...args);
      }
      if (options.sink) {
        const rendered = args.length ? `${line} ${args.map(renderArg).join(" ")}` : line;
        options.sink(level, rendered);
      }
    };
  };

  return {
    debug: wrap("debug"),
    info: wrap("info"),
    warn: wrap("warn"),
    error: wrap("error"),
  };
}

/**
 * Logger that drops everything; handy for tests and embedding
 */
export const silentLogger: HubLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
