/**
 * ha-globaldefs
 *
 * Directive dispatch and validation for the global definitions block of a
 * high-availability daemon's configuration.
 *
 * @packageDocumentation
 */

import { getVersionFromPackageJson } from './utils/version.js';

/**
 * Library version string, as declared in package.json.
 */
export const VERSION = getVersionFromPackageJson();

export * from './global/index.js';
export * from './validators/index.js';
export * from './config/index.js';
export * from './parser/index.js';
export { tokenizeLine } from './reader/tokenizer.js';
export { TokenLineSource } from './reader/source.js';
export { Logger, logger } from './utils/logger.js';
export type { LogEntry, LoggerOptions, LogLevel } from './utils/logger.js';
