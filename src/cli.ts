#!/usr/bin/env node
/**
 * CLI for ocistore-migrate - apply, inspect and roll back schema migrations
 * of the OCI image store
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import {
  initializeDatabase,
  migrateToLatest,
  getMigrationStatus,
  rollbackLastBatch,
  closeDatabase,
} from './database/index.js';
import type { MigrationStatus } from './database/index.js';
import {
  DEFAULT_CONFIG_PATH,
  loadConfigFile,
  resolveDatabaseConfig,
  resolveDebugSettings,
  validateConfig,
} from './config/loader.js';
import { initDebugLogger, closeDebugLogger } from './utils/debug-logger.js';
import { handleInitializationError, setupGlobalErrorHandlers } from './utils/error-handler.js';

// ============================================================================
// Type Definitions
// ============================================================================

type OutputFormat = 'json' | 'table';

interface CLIArgs {
  command?: string;
  output: OutputFormat;
  'db-path'?: string;
  config?: string;
  'debug-log'?: string;
  help?: boolean;
}

/**
 * Where command output goes; tests pass their own
 */
export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const consoleOutput: CliOutput = {
  log: line => console.log(line),
  error: line => console.error(line),
};

const COMMANDS = ['migrate', 'status', 'rollback'] as const;
type Command = typeof COMMANDS[number];

const VALUE_OPTIONS = ['db-path', 'config', 'debug-log', 'output'] as const;
type ValueOption = typeof VALUE_OPTIONS[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function isValueOption(value: string): value is ValueOption {
  return VALUE_OPTIONS.some(option => option === value);
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse command-line arguments into structured object
 *
 * @throws {Error} On unknown options, missing values or an unknown --output
 */
export function parseArgs(args: string[]): CLIArgs {
  const parsed: CLIArgs = { output: 'json' };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg.startsWith('--')) {
      const [key = '', inline] = arg.slice(2).split(/=(.*)/s, 2);
      if (!isValueOption(key)) {
        throw new Error(`Unknown option: --${key}`);
      }

      let value = inline;
      if (value === undefined) {
        value = args[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new Error(`Option --${key} requires a value`);
        }
        i++; // Skip the value in next iteration
      }

      if (key === 'output') {
        if (value !== 'json' && value !== 'table') {
          throw new Error(`Invalid --output "${value}" (expected json or table)`);
        }
        parsed.output = value;
      } else {
        parsed[key] = value;
      }
    } else if (!parsed.command) {
      parsed.command = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return parsed;
}

/**
 * Format rows as ASCII table
 */
export function formatTable(rows: Array<Record<string, string | number>>, headers: string[]): string[] {
  if (rows.length === 0) {
    return ['No results found.'];
  }

  const cell = (row: Record<string, string | number>, header: string): string => {
    const value = String(row[header] ?? '');
    return value.length > 50 ? value.slice(0, 47) + '...' : value;
  };

  // Calculate column widths
  const widths = headers.map(header =>
    Math.max(header.length, ...rows.map(row => cell(row, header).length))
  );

  const lines = [
    headers.map((header, i) => header.padEnd(widths[i] ?? 0)).join(' | ').trimEnd(),
    widths.map(width => '-'.repeat(width)).join('-+-'),
  ];
  for (const row of rows) {
    lines.push(headers.map((header, i) => cell(row, header).padEnd(widths[i] ?? 0)).join(' | ').trimEnd());
  }
  lines.push('', `Total: ${rows.length} result(s)`);
  return lines;
}

function statusRows(status: MigrationStatus): Array<Record<string, string | number>> {
  return [
    ...status.applied.map(migration => ({
      name: migration.name,
      status: 'applied',
      batch: migration.batch,
      migrated_at: migration.migratedAt,
    })),
    ...status.pending.map(name => ({ name, status: 'pending', batch: '', migrated_at: '' })),
  ];
}

const HELP = `
ocistore-migrate - schema migrations for the OCI image store

USAGE:
  ocistore-migrate <command> [options]

COMMANDS:
  migrate    Apply all pending migrations (one batch, one transaction)
  status     List applied and pending migrations
  rollback   Revert the most recent batch

OPTIONS:
  --db-path <file>     SQLite database file (default: .ocistore/oci.db)
  --config <file>      Config file (default: ${DEFAULT_CONFIG_PATH})
  --debug-log <file>   Write a debug log to <file>
  --output json|table  Output format for status (default: json)
  --help               Show this help message

ENVIRONMENT:
  OCISTORE_DB_PATH, OCISTORE_DEBUG, OCISTORE_LOG_LEVEL
`;

// ============================================================================
// Commands
// ============================================================================

async function runCommand(command: Command, args: CLIArgs, out: CliOutput): Promise<void> {
  switch (command) {
    case 'migrate': {
      const result = await migrateToLatest();
      if (result.migrations.length === 0) {
        out.log('Already up to date.');
      } else {
        out.log(`Batch ${result.batch} applied: ${result.migrations.join(', ')}`);
      }
      return;
    }
    case 'status': {
      const status = await getMigrationStatus();
      if (args.output === 'json') {
        out.log(JSON.stringify(status, null, 2));
      } else {
        formatTable(statusRows(status), ['name', 'status', 'batch', 'migrated_at']).forEach(line => out.log(line));
      }
      return;
    }
    case 'rollback': {
      const result = await rollbackLastBatch();
      if (result.migrations.length === 0) {
        out.log('Nothing to roll back.');
      } else {
        out.log(`Batch ${result.batch} rolled back: ${result.migrations.join(', ')}`);
      }
      return;
    }
  }
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Run CLI with provided arguments
 *
 * @param rawArgs - Command line arguments (without 'node' and script path)
 * @returns Process exit code
 */
export async function runCli(rawArgs: string[], out: CliOutput = consoleOutput): Promise<number> {
  let args: CLIArgs;
  try {
    args = parseArgs(rawArgs);
  } catch (error) {
    out.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    out.error('Run "ocistore-migrate --help" for usage information.');
    return 1;
  }

  if (args.help || !args.command) {
    out.log(HELP);
    return 0;
  }

  const command = args.command;
  if (!isCommand(command)) {
    out.error(`Unknown command: ${command}`);
    out.error('Run "ocistore-migrate --help" for usage information.');
    return 1;
  }

  try {
    const fileConfig = loadConfigFile(args.config ?? DEFAULT_CONFIG_PATH);
    const validation = validateConfig(fileConfig);
    if (!validation.valid) {
      out.error('Invalid configuration:');
      validation.errors.forEach(message => out.error(`  - ${message}`));
      return 1;
    }

    const overrides = { dbPath: args['db-path'], debugLogPath: args['debug-log'] };
    const debug = resolveDebugSettings(fileConfig, overrides);
    initDebugLogger(debug.logPath, debug.logLevel);

    await initializeDatabase(resolveDatabaseConfig(fileConfig, overrides), { migrate: false });
    await runCommand(command, args, out);
    return 0;
  } catch (error) {
    out.error(`Error: ${handleInitializationError(error)}`);
    return 1;
  } finally {
    await closeDatabase();
    await closeDebugLogger();
  }
}

function isDirectExecution(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

// Run CLI when executed directly (also through the npm bin symlink)
if (isDirectExecution()) {
  setupGlobalErrorHandlers(closeDatabase);
  void runCli(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  });
}
