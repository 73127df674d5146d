/** Severity of a log line. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Minimal logger used across the terminal core. Every module receives one
 * through its options so hosts can route output wherever they like.
 */
export type Logger = {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
};

export type ConsoleLoggerOptions = {
  /** Emit debug lines (off by default, the decoder is chatty). */
  debug?: boolean;
  /** Mirror every emitted line to this callback, e.g. for an on-screen log. */
  onLog?: (line: string) => void;
};

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === "string") return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/** Create a console-backed logger that tags each line with `[scope]`. */
export function createConsoleLogger(scope: string, options: ConsoleLoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  const emit = (level: LogLevel, message: string, args: unknown[]) => {
    if (level === "debug" && !options.debug) return;
    const line = `${prefix} ${message}`;
    if (options.onLog) {
      options.onLog(args.length ? `${line} ${args.map(formatArg).join(" ")}` : line);
    }
    if (level === "error") console.error(line, ...args);
    else if (level === "warn") console.warn(line, ...args);
    else console.log(line, ...args);
  };
  return {
    debug: (message, ...args) => emit("debug", message, args),
    info: (message, ...args) => emit("info", message, args),
    warn: (message, ...args) => emit("warn", message, args),
    error: (message, ...args) => emit("error", message, args),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
