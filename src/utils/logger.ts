import type { LogLevel } from '../config/types.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? `${err.name}: ${err.message}`;
  }
  return String(err);
}

// stdout belongs to the MCP stdio transport, so every line goes to stderr.
function write(level: LogLevel, component: string, message: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${component}] ${message}\n`;
  process.stderr.write(line);
}

export function createLogger(component: string): Logger {
  return {
    debug: (message) => write('debug', component, message),
    info: (message) => write('info', component, message),
    warn: (message) => write('warn', component, message),
    error: (message, err) => {
      const suffix = err === undefined ? '' : ` :: ${describeError(err)}`;
      write('error', component, `${message}${suffix}`);
    },
  };
}
