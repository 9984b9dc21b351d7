// Stderr logger. stdout is reserved for command results and the MCP stdio transport.

export type LogLevel = "debug" | "info" | "warn";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

const PREFIX = "[trace-audit]";

export function createLogger(verbose: boolean = false): Logger {
  const write = (level: LogLevel, message: string): void => {
    const tag = level === "info" ? "" : ` ${level}:`;
    process.stderr.write(`${PREFIX}${tag} ${message}\n`);
  };
  return {
    debug: (message) => {
      if (verbose) write("debug", message);
    },
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
