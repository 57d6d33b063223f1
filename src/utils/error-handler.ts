/**
 * Centralized error handling module for ocistore-migrate
 * Provides consistent error logging, classification, and process-level handlers
 */

import { debugLog, debugLogError } from './debug-logger.js';

export interface ErrorDetails {
  message: string;
  stack?: string;
  errorType: string;
}

/**
 * Format error details for logging and reporting
 */
export function formatErrorDetails(error: unknown): ErrorDetails {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack, errorType: error.constructor.name };
  }
  return { message: String(error), errorType: typeof error };
}

function lowerMessage(error: unknown): string {
  return formatErrorDetails(error).message.toLowerCase();
}

/**
 * True when the engine reports a table that does not exist
 *
 * SQLite: "no such table", MySQL: "Unknown table" / "doesn't exist",
 * PostgreSQL: "does not exist"
 */
export function isMissingTableError(error: unknown): boolean {
  const msg = lowerMessage(error);
  return (
    msg.includes('no such table') ||
    msg.includes('unknown table') ||
    msg.includes("doesn't exist") ||
    msg.includes('does not exist')
  );
}

/**
 * True when the engine reports an object (index, table) that already exists
 *
 * MySQL: "Duplicate key name", SQLite/PostgreSQL: "already exists"
 */
export function isDuplicateObjectError(error: unknown): boolean {
  const msg = lowerMessage(error);
  return (
    msg.includes('already exists') ||
    msg.includes('duplicate key name') ||
    msg.includes('duplicate index')
  );
}

/**
 * Handle a failed migration or step
 * Logs with stack at ERROR level and returns an Error to rethrow, with the
 * original failure attached as `cause`
 */
export function handleMigrationError(context: string, error: unknown): Error {
  const { message, stack, errorType } = formatErrorDetails(error);

  debugLogError(context, error, {
    errorType,
    stack,
  });

  return new Error(`${context} failed: ${message}`, { cause: error });
}

/**
 * Handle initialization errors (system-critical)
 * Logs the error at FATAL level and returns formatted error message
 */
export function handleInitializationError(error: unknown): string {
  const { message, stack, errorType } = formatErrorDetails(error);

  debugLogError('INITIALIZATION_ERROR', error, {
    errorType,
    stack,
  }, 'FATAL');

  return message;
}

/**
 * Setup global error handlers for the CLI process
 * Unlike a long-running service, a migration run must not continue after an
 * unexpected failure: log, clean up, exit non-zero.
 */
export function setupGlobalErrorHandlers(
  onCleanup?: () => Promise<void>
): void {
  const fail = (kind: string, error: unknown): void => {
    const { message, stack } = formatErrorDetails(error);
    console.error(`\n❌ ${kind}: ${message}`);
    debugLogError(kind, error, { stack }, 'FATAL');
    const cleanup = onCleanup ? onCleanup() : Promise.resolve();
    void cleanup
      .catch(cleanupError => {
        console.error(`   Cleanup failed: ${formatErrorDetails(cleanupError).message}`);
      })
      .finally(() => process.exit(1));
  };

  process.on('uncaughtException', (error: Error) => fail('UNCAUGHT_EXCEPTION', error));
  process.on('unhandledRejection', (reason: unknown) => fail('UNHANDLED_REJECTION', reason));

  const shutdown = (signal: string): void => {
    debugLog('WARN', `Received ${signal}, shutting down`);
    const cleanup = onCleanup ? onCleanup() : Promise.resolve();
    void cleanup
      .catch(cleanupError => {
        console.error(`   Cleanup failed: ${formatErrorDetails(cleanupError).message}`);
      })
      .finally(() => process.exit(130));
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
