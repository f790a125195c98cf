/**
 * Shared error handling utilities for CLI commands.
 */

import type { CliCommandResult } from '../types.js';
import { CliUsageError } from '../types.js';

/**
 * Runs a command handler and converts thrown errors into an exit code.
 *
 * - On success: the result's exit code
 * - On error: the message is written to stderr and the exit code is 1
 *
 * @param fn - The command handler.
 * @returns The exit code to leave the process with.
 */
export function runWithErrorHandling(fn: () => CliCommandResult): number {
  try {
    return fn().exitCode;
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (error instanceof CliUsageError) {
        console.error('\nRun "globaldefs help" for usage information.');
      }
    } else {
      console.error(`Error: ${String(error)}`);
    }
    return 1;
  }
}

/**
 * Wraps a command handler with standard error handling and exits the
 * process with its exit code.
 *
 * @param fn - The command handler.
 */
export function withErrorHandling(fn: () => CliCommandResult): void {
  process.exit(runWithErrorHandling(fn));
}
