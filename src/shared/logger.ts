/**
 * Lightweight leveled logger.
 *
 * Reads `LOG_LEVEL` from the environment (after dotenv has loaded the
 * config-dir .env) and gates output accordingly.  Supports the standard
 * levels: error, warn, info, debug.
 *
 * Every level is written to stderr: stdout carries the MCP stdio channel,
 * and a stray line there corrupts the caller's JSON-RPC stream.
 *
 * Usage:
 *   import { createLogger } from '../shared/logger.js';
 *   const log = createLogger('gateway');
 *   log.info('Connected');        // [2026-02-21 12:00:00] [INFO]  [gateway] Connected
 *   log.debug('Payload', data);   // only shown when LOG_LEVEL=debug
 */

// ── Log levels (lower = more severe) ────────────────────────────────────

const LEVELS = { error: 0, warn: 1, info: 2, debug: 3 } as const;
type LevelName = keyof typeof LEVELS;

const COLORS: Record<LevelName, string> = {
  error: '\x1b[31m', // red
  warn: '\x1b[33m', // yellow
  info: '\x1b[32m', // green
  debug: '\x1b[34m', // blue
};
const RESET = '\x1b[0m';

// ── Resolve effective level lazily ──────────────────────────────────────

let resolvedThreshold: number | null = null;

function isLevelName(value: string): value is LevelName {
  return value in LEVELS;
}

function threshold(): number {
  if (resolvedThreshold === null) {
    const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
    resolvedThreshold = isLevelName(env) ? LEVELS[env] : LEVELS.info;
  }
  return resolvedThreshold;
}

/** Forget the cached level so the next log line re-reads `LOG_LEVEL`. */
export function resetLogLevel(): void {
  resolvedThreshold = null;
}

// ── Formatting ──────────────────────────────────────────────────────────

function timestamp(): string {
  const d = new Date();
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function formatMessage(level: LevelName, mod: string, msg: string): string {
  const tag = level.toUpperCase().padEnd(5);
  return `[${timestamp()}] [${COLORS[level]}${tag}${RESET}] [${mod}] ${msg}`;
}

// ── Logger interface ────────────────────────────────────────────────────

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a child logger with a fixed module label.
 *
 * @param module - Short identifier for the module (e.g., 'engine', 'gateway', 'keys').
 */
export function createLogger(module: string): Logger {
  const emit = (level: LevelName, message: string, args: unknown[]) => {
    if (LEVELS[level] > threshold()) return;
    console.error(formatMessage(level, module, message), ...args);
  };

  return {
    error: (message: string, ...args: unknown[]) => emit('error', message, args),
    warn: (message: string, ...args: unknown[]) => emit('warn', message, args),
    info: (message: string, ...args: unknown[]) => emit('info', message, args),
    debug: (message: string, ...args: unknown[]) => emit('debug', message, args),
  };
}
