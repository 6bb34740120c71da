import type { LogLevel } from '../config/types.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, err?: unknown): void;
  error(message: string, err?: unknown): void;
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? `${err.name}: ${err.message}`;
  }
  return String(err);
}

// stdout is reserved for the MCP and JSON-lines transports, so everything goes to stderr.
function write(level: LogLevel, name: string, message: string, err?: unknown): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;
  const line = `[${new Date().toISOString()}] ${level.toUpperCase()} [${name}] ${message}`;
  process.stderr.write(err === undefined ? `${line}\n` : `${line}\n  ${describeError(err)}\n`);
}

export function createLogger(name: string): Logger {
  return {
    debug: (message) => write('debug', name, message),
    info: (message) => write('info', name, message),
    warn: (message, err) => write('warn', name, message, err),
    error: (message, err) => write('error', name, message, err),
  };
}
