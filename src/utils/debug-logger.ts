/**
 * Debug Logger for ocistore-migrate
 *
 * Enables debug logging when specified via CLI arg, environment variable, or config file.
 * Priority: CLI arg > Environment variable > Config file
 *
 * Usage:
 *   ocistore-migrate migrate --debug-log=/path/to/debug.log
 *   OCISTORE_DEBUG=/path/to/debug.log ocistore-migrate migrate
 *   OR set debug.log_path in .ocistore/config.toml
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LogLevel } from '../config/types.js';

let debugEnabled = false;
let debugStream: fs.WriteStream | null = null;
let currentLogLevel: LogLevel = 'INFO';

// Log level hierarchy (higher number = more verbose)
// FATAL: unrecoverable failures (initialization, uncaught errors)
// ERROR: failed migrations and steps
// WARN: discarded data, skipped guards that look suspicious
// INFO: migration and step outcomes
// DEBUG: SQL-level detail
const LOG_LEVELS: Record<LogLevel, number> = {
  FATAL: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4,
};

const LEVEL_NAMES: readonly LogLevel[] = ['FATAL', 'ERROR', 'WARN', 'INFO', 'DEBUG'];

function toLogLevel(level: string): LogLevel | undefined {
  const upper = level.toUpperCase();
  return LEVEL_NAMES.find(known => known === upper);
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] <= LOG_LEVELS[currentLogLevel];
}

/**
 * Initialize debug logger
 * @param debugLogPath - Log path (already resolved with priority: CLI > env > config)
 * @param logLevel - Log level (case-insensitive: "error", "warn", "info", "debug")
 */
export function initDebugLogger(debugLogPath?: string, logLevel?: string): void {
  if (!debugLogPath) {
    return;
  }

  if (logLevel) {
    currentLogLevel = toLogLevel(logLevel) ?? currentLogLevel;
  }

  try {
    const logDir = path.dirname(debugLogPath);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    debugStream = fs.createWriteStream(debugLogPath, { flags: 'a' });
    debugEnabled = true;

    debugLog('INFO', '='.repeat(80));
    debugLog('INFO', 'ocistore-migrate debug log started');
    debugLog('INFO', `Process ID: ${process.pid}`);
    debugLog('INFO', `Log Level: ${currentLogLevel}`);
  } catch (error) {
    console.error(`Failed to initialize debug logger: ${error}`);
    debugEnabled = false;
  }
}

/**
 * Collapse newlines so every entry stays on one line
 */
function sanitizeForSingleLine(str: string): string {
  return str.replace(/\r?\n/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Format a log entry (exported for tests)
 */
export function formatLogEntry(level: LogLevel, message: string, data?: unknown, now: Date = new Date()): string {
  let logEntry = `[${now.toISOString()}] [${level}] ${sanitizeForSingleLine(message)}`;

  if (data !== undefined) {
    const dataStr = typeof data === 'string'
      ? sanitizeForSingleLine(data)
      : sanitizeForSingleLine(JSON.stringify(data));
    logEntry += ` | Data: ${dataStr}`;
  }

  return logEntry;
}

/**
 * Write debug log entry (always single-line format)
 */
export function debugLog(level: LogLevel, message: string, data?: unknown): void {
  if (!debugEnabled || !debugStream) {
    return;
  }

  if (!shouldLog(level)) {
    return;
  }

  try {
    debugStream.write(formatLogEntry(level, message, data) + '\n');
  } catch (error) {
    console.error(`Failed to write debug log: ${error}`);
  }
}

/**
 * Log error with stack trace
 * @param level - FATAL for system-critical, ERROR for failed operations
 */
export function debugLogError(
  context: string,
  error: unknown,
  additionalContext?: Record<string, unknown>,
  level: 'FATAL' | 'ERROR' = 'ERROR'
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  debugLog(level, `${context}: ${errorMessage}`, {
    stack,
    ...additionalContext,
  });
}

/**
 * Log the outcome of one migration step
 */
export function debugLogMigrationStep(
  stepId: string,
  status: 'applied' | 'skipped' | 'failed',
  detail?: string
): void {
  debugLog(status === 'failed' ? 'ERROR' : 'INFO', `Migration step ${stepId}: ${status}`, detail ? { detail } : undefined);
}

/**
 * Log transaction boundaries
 */
export function debugLogTransaction(action: 'START' | 'COMMIT' | 'ROLLBACK', context: string): void {
  if (!debugEnabled) return;

  debugLog('DEBUG', `Transaction ${action} [${context}]`);
}

/**
 * Log a statement before it runs
 */
export function debugLogQuery(context: string, sql: string, bindings?: readonly unknown[]): void {
  if (!debugEnabled) return;

  debugLog('DEBUG', `DB Query [${context}]`, {
    sql: sql.replace(/\s+/g, ' ').trim(),
    bindings: bindings ?? null,
  });
}

/**
 * Close debug logger; resolves once buffered entries are flushed
 */
export function closeDebugLogger(): Promise<void> {
  const stream = debugStream;
  if (!stream) {
    return Promise.resolve();
  }

  debugLog('INFO', 'ocistore-migrate debug log ended');
  debugStream = null;
  debugEnabled = false;
  currentLogLevel = 'INFO';

  return new Promise((resolve, reject) => {
    stream.once('error', reject);
    stream.end(() => resolve());
  });
}

/**
 * Check if debug logging is enabled
 */
export function isDebugEnabled(): boolean {
  return debugEnabled;
}
