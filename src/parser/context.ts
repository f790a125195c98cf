/**
 * State shared by every handler during one parse pass.
 *
 * @packageDocumentation
 */

import type { GlobalData, ScriptIdentity } from '../global/types.js';
import type { HostResolver } from '../validators/address.js';
import { StaticHostResolver } from '../validators/address.js';
import type { IntegerBounds } from '../validators/types.js';
import type { DiagnosticLevel, DiagnosticSink } from './diagnostics.js';
import { DiagnosticCollector } from './diagnostics.js';
import type { TokenLine } from './token-line.js';

/**
 * Registers configured email recipients, one address at a time.
 */
export interface EmailAccumulator {
  add(address: string): void;
}

/**
 * Reads the `{ … }` block of values that follows a directive.
 */
export interface ValueBlockReader {
  /**
   * @param line - The line holding the directive.
   * @returns The block's entries in order, or `undefined` when the line
   *   opens no block.
   */
  readValueBlock(line: TokenLine): readonly string[] | undefined;
}

/**
 * Validates the user, and optionally the group, that scripts run as.
 *
 * @returns The identity, or `undefined` when the user or group is not valid.
 */
export type ScriptUserLookup = (user: string, group: string | undefined) => ScriptIdentity | undefined;

/**
 * Scheduler limits handlers clamp to.
 */
export interface SchedulerLimits {
  readonly realtimePriority: IntegerBounds;
}

/**
 * Everything a directive handler may read or mutate.
 */
export interface HandlerContext {
  /** The record being assembled. */
  readonly data: GlobalData;
  /** Whether this pass is a reload. Frozen-on-reload directives are skipped. */
  readonly reload: boolean;
  readonly resolver: HostResolver;
  readonly emails: EmailAccumulator;
  readonly blocks: ValueBlockReader;
  readonly scriptUsers: ScriptUserLookup;
  readonly scheduler: SchedulerLimits;
  /**
   * Reports a diagnostic about `directive`.
   *
   * @param level - Defaults to `error`.
   */
  report(directive: string, message: string, level?: DiagnosticLevel): void;
}

/**
 * Options for {@link createHandlerContext}. Omitted collaborators fall back
 * to in-process defaults.
 */
export interface HandlerContextOptions {
  readonly data: GlobalData;
  readonly reload?: boolean;
  readonly resolver?: HostResolver;
  readonly emails?: EmailAccumulator;
  readonly blocks?: ValueBlockReader;
  readonly scriptUsers?: ScriptUserLookup;
  readonly scheduler?: SchedulerLimits;
  readonly diagnostics?: DiagnosticSink;
}

const POSIX_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*\$?$/;

/**
 * Accepts user and group names of the portable POSIX form.
 */
export const posixScriptUserLookup: ScriptUserLookup = (user, group) => {
  if (!POSIX_NAME.test(user)) {
    return undefined;
  }
  if (group !== undefined && !POSIX_NAME.test(group)) {
    return undefined;
  }
  return { user, group };
};

/**
 * Reads a block written on the directive's own line, e.g.
 * `notification_email { a@example.test b@example.test }`.
 */
export const inlineBlockReader: ValueBlockReader = {
  readValueBlock(line) {
    if (line.at(1) !== '{') {
      return undefined;
    }
    const entries: string[] = [];
    for (const token of line.from(2)) {
      if (token === '}') {
        break;
      }
      entries.push(token);
    }
    return entries;
  },
};

/**
 * Builds a context, filling in defaults for omitted collaborators.
 */
export function createHandlerContext(options: HandlerContextOptions): HandlerContext {
  const { data } = options;
  const sink = options.diagnostics ?? new DiagnosticCollector();
  return {
    data,
    reload: options.reload ?? false,
    resolver: options.resolver ?? new StaticHostResolver(),
    emails: options.emails ?? {
      add(address) {
        data.mail.emailTo.push(address);
      },
    },
    blocks: options.blocks ?? inlineBlockReader,
    scriptUsers: options.scriptUsers ?? posixScriptUserLookup,
    scheduler: options.scheduler ?? { realtimePriority: { min: 1, max: 99 } },
    report(directive, message, level = 'error') {
      sink.report({ level, directive, message });
    },
  };
}
