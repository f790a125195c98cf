#!/usr/bin/env node

/**
 * globaldefs CLI entry point.
 */

import { handleCheckCommand } from './commands/check.js';
import { handleDirectivesCommand } from './commands/directives.js';
import { handleVersionCommand } from './commands/version.js';
import { withErrorHandling } from './utils/errorHandling.js';

const COMMAND_HELP: Readonly<Record<string, string>> = {
  check: `
USAGE: globaldefs check <file> [options]

Parses the global definitions in <file> and prints one line per
diagnostic. Exits with 1 when any line was rejected.

OPTIONS:
  --settings <path>      Parser settings file (default: ./globaldefs.toml if present)
  --json                 Print the resulting configuration as JSON
  --reload-from <file>   Treat the run as a reload of the configuration in <file>

EXAMPLES:
  globaldefs check global.conf
  globaldefs check lb.conf --json
  globaldefs check lb.conf --reload-from lb.conf.old
`,
  directives: `
USAGE: globaldefs directives [--settings <path>]

Lists the directive names enabled by the current settings.
`,
};

/**
 * Displays usage information.
 */
function showHelp(): void {
  console.log(`
globaldefs - global definitions checker

USAGE:
  globaldefs <command> [options]

COMMANDS:
  check        Parse a configuration file and report diagnostics
  directives   List the enabled directives
  help         Show this help message
  version      Show version information

ENVIRONMENT:
  GLOBALDEFS_FEATURES_<NAME>             Enable or disable a feature (true/false)
  GLOBALDEFS_SCHEDULER_RT_PRIORITY_MIN   Lowest real-time priority
  GLOBALDEFS_SCHEDULER_RT_PRIORITY_MAX   Highest real-time priority
  GLOBALDEFS_DEBUG                       Enable debug logging
`);
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  const help = COMMAND_HELP[commandName];
  if (help !== undefined) {
    console.log(help);
  } else {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "globaldefs help" to see all available commands.');
  }
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? '';
  const commandArgs = args.slice(1);

  if (!command) {
    showHelp();
    process.exit(0);
  }

  if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
    showHelpForCommand(command);
    process.exit(0);
  }

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        showHelp();
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand());
      break;

    case 'check':
      withErrorHandling(() => handleCheckCommand(commandArgs));
      break;

    case 'directives':
      withErrorHandling(() => handleDirectivesCommand(commandArgs));
      break;

    default:
      console.error(`Error: Unknown command: ${command}`);
      console.error('\nRun "globaldefs help" for usage information.');
      process.exit(1);
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
