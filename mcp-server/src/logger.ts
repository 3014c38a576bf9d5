export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

type LogLevel = "info" | "warn" | "error" | "debug";

// stdout belongs to the stdio MCP transport, so every level is written to stderr.
const isJsonFormat = process.env.LOG_FORMAT === "json";
const isDebugEnabled = Boolean(process.env.DEBUG);

function formatData(args: unknown[]): unknown | undefined {
  if (args.length === 0) return undefined;
  return args.length === 1 ? args[0] : args;
}

function serializeError(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export function createLogger(component: string): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]) => {
    if (level === "debug" && !isDebugEnabled) return;

    if (isJsonFormat) {
      const entry: Record<string, unknown> = {
        timestamp: new Date().toISOString(),
        level,
        component,
        message,
      };
      const data = formatData(args);
      if (data !== undefined) entry.data = data;
      console.error(JSON.stringify(entry, serializeError));
      return;
    }

    console.error(`[${component}]`, level.toUpperCase(), message, ...args);
  };

  return {
    info: (msg, ...args) => write("info", msg, args),
    warn: (msg, ...args) => write("warn", msg, args),
    error: (msg, ...args) => write("error", msg, args),
    debug: (msg, ...args) => write("debug", msg, args),
  };
}
