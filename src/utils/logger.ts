/**
 * Structured Logger
 * Leveled log lines with JSON metadata, on stderr so stdout only ever
 * carries the formatted result. Colour only when stderr is a terminal.
 */

import type { LogLevel, LogEntry } from '../types/index.js';

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const COLOR: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? '';
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function render(entry: LogEntry): string {
  const head = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
  const tinted = process.stderr.isTTY ? `${COLOR[entry.level]}${head}${RESET}` : head;
  const meta = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `${tinted} ${entry.message}${meta}`;
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[threshold]) return;
  console.error(render({ timestamp: new Date().toISOString(), level, message, ...(data && { data }) }));
}

export const logger = {
  debug: (message: string, data?: Record<string, unknown>) => log('debug', message, data),
  info: (message: string, data?: Record<string, unknown>) => log('info', message, data),
  warn: (message: string, data?: Record<string, unknown>) => log('warn', message, data),
  error: (message: string, data?: Record<string, unknown>) => log('error', message, data),

  // Dispatch audit trail
  dispatch: {
    resolved: (operation: string, source: string, ruleId?: string) => {
      log('info', 'Intent resolved', { operation, source, ...(ruleId && { ruleId }), dispatch: true });
    },
    completed: (operation: string, success: boolean, duration_ms: number) => {
      log('info', 'Command executed', { operation, success, duration_ms, dispatch: true });
    },
  },
};
