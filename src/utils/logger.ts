export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

// stdout belongs to the MCP stdio transport, so every level goes to stderr.
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, fields?: LogFields) => {
    const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
    console.error(`${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}${suffix}`);
  };

  return {
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
  };
}
