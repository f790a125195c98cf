/**
 * Check command: parses a configuration file and reports its diagnostics.
 */

import { existsSync, readFileSync } from 'node:fs';
import { loadSettings } from '../../config/loader.js';
import type { ParserSettings } from '../../config/types.js';
import { serializeGlobalConfig } from '../../global/snapshot.js';
import type { GlobalConfig } from '../../global/types.js';
import { formatDiagnostic, LoggerDiagnosticSink } from '../../parser/diagnostics.js';
import { parseGlobalDefs } from '../../parser/pass.js';
import type { ParsePassResult } from '../../parser/pass.js';
import { Logger } from '../../utils/logger.js';
import type { CliCommandResult } from '../types.js';
import { CliUsageError } from '../types.js';

/**
 * Parsed arguments of the check command.
 */
export interface CheckArgs {
  readonly file: string;
  readonly settingsPath: string | undefined;
  readonly json: boolean;
  readonly reloadFrom: string | undefined;
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parses `check` arguments.
 *
 * @throws CliUsageError for unknown flags, missing values or a missing file.
 */
export function parseCheckArgs(args: readonly string[]): CheckArgs {
  let file: string | undefined;
  let settingsPath: string | undefined;
  let json = false;
  let reloadFrom: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '--settings':
        settingsPath = requireValue(args, i + 1, arg);
        i++;
        break;
      case '--reload-from':
        reloadFrom = requireValue(args, i + 1, arg);
        i++;
        break;
      case '--json':
        json = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        if (file !== undefined) {
          throw new CliUsageError(`Unexpected argument: ${arg}`);
        }
        file = arg;
    }
  }

  if (file === undefined) {
    throw new CliUsageError('check requires a configuration file');
  }
  return { file, settingsPath, json, reloadFrom };
}

function readConfigFile(path: string): string {
  if (!existsSync(path)) {
    throw new Error(`Configuration file not found: ${path}`);
  }
  return readFileSync(path, 'utf-8');
}

function parseFile(
  path: string,
  settings: ParserSettings,
  logger: Logger,
  previous: GlobalConfig | undefined
): ParsePassResult {
  return parseGlobalDefs(readConfigFile(path), {
    settings,
    logger,
    ...(previous === undefined ? {} : { previous }),
    ...(settings.logging.debug ? { diagnostics: new LoggerDiagnosticSink(logger) } : {}),
  });
}

/**
 * Handles the check command.
 *
 * Prints one line per diagnostic and, with `--json`, the resulting
 * configuration. Exits 1 when any error-level diagnostic was reported.
 */
export function handleCheckCommand(args: readonly string[]): CliCommandResult {
  const options = parseCheckArgs(args);
  const settings = loadSettings(
    options.settingsPath === undefined ? {} : { path: options.settingsPath }
  );
  const logger = new Logger({ component: 'GlobalDefs', debugMode: settings.logging.debug });

  const previous =
    options.reloadFrom === undefined
      ? undefined
      : parseFile(options.reloadFrom, settings, logger, undefined).config;
  const result = parseFile(options.file, settings, logger, previous);

  for (const diagnostic of result.diagnostics) {
    console.log(formatDiagnostic(diagnostic));
  }
  if (options.json) {
    console.log(serializeGlobalConfig(result.config, 2));
  }

  const hasErrors = result.diagnostics.some((diagnostic) => diagnostic.level === 'error');
  return { exitCode: hasErrors ? 1 : 0 };
}
