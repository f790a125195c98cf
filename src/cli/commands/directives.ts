/**
 * Directives command: lists the directive names the current settings
 * enable.
 */

import { loadSettings } from '../../config/loader.js';
import { buildDirectiveTable } from '../../parser/registry.js';
import type { CliCommandResult } from '../types.js';
import { CliUsageError } from '../types.js';

/**
 * Handles the directives command.
 */
export function handleDirectivesCommand(args: readonly string[]): CliCommandResult {
  let settingsPath: string | undefined;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--settings') {
      settingsPath = args[i + 1];
      if (settingsPath === undefined) {
        throw new CliUsageError('--settings requires a value');
      }
      i++;
    } else {
      throw new CliUsageError(`Unexpected argument: ${String(arg)}`);
    }
  }

  const settings = loadSettings(settingsPath === undefined ? {} : { path: settingsPath });
  for (const name of buildDirectiveTable(settings.features).names()) {
    console.log(name);
  }
  return { exitCode: 0 };
}
