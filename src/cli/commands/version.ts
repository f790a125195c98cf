/**
 * Version command handler.
 *
 * Displays the version read from package.json.
 */

import { getVersionFromPackageJson } from '../../utils/version.js';
import type { CliCommandResult } from '../types.js';

export { getVersionFromPackageJson };

/**
 * Handles the version command.
 */
export function handleVersionCommand(): CliCommandResult {
  console.log(`globaldefs v${getVersionFromPackageJson()}`);
  return { exitCode: 0 };
}
