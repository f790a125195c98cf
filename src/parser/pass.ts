/**
 * One configuration pass: token lines in, frozen configuration out.
 *
 * @packageDocumentation
 */

import { getDefaultSettings } from '../config/parser.js';
import type { ParserSettings } from '../config/types.js';
import { createDefaultGlobalData } from '../global/defaults.js';
import { snapshotGlobalData } from '../global/snapshot.js';
import type { GlobalConfig, GlobalData } from '../global/types.js';
import { TokenLineSource } from '../reader/source.js';
import type { Logger } from '../utils/logger.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { HostResolver } from '../validators/address.js';
import { StaticHostResolver } from '../validators/address.js';
import type { EmailAccumulator, ScriptUserLookup } from './context.js';
import { createHandlerContext, inlineBlockReader } from './context.js';
import type { Diagnostic, DiagnosticSink } from './diagnostics.js';
import { DiagnosticCollector, TeeDiagnosticSink } from './diagnostics.js';
import type { DirectiveTable } from './registry.js';
import { buildDirectiveTable } from './registry.js';
import type { TokenLine } from './token-line.js';

/**
 * Options for {@link runParsePass}.
 */
export interface ParsePassOptions {
  /** Parser settings; defaults when omitted. */
  readonly settings?: ParserSettings;
  /** Snapshot of the previous pass. Its presence makes this pass a reload. */
  readonly previous?: GlobalConfig;
  /** Additional sink receiving every diagnostic as it is reported. */
  readonly diagnostics?: DiagnosticSink;
  /** Name resolver; defaults to the settings' hosts table. */
  readonly resolver?: HostResolver;
  readonly scriptUsers?: ScriptUserLookup;
  readonly emails?: EmailAccumulator;
  /** Directive table; defaults to the table for the settings' features. */
  readonly table?: DirectiveTable;
  readonly logger?: Logger;
}

/**
 * Result of a pass.
 */
export interface ParsePassResult {
  readonly config: GlobalConfig;
  /** Every diagnostic of the pass, in order. */
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Carries the fields that must not change across a reload over from the
 * previous snapshot.
 */
function carryFrozenFields(data: GlobalData, previous: GlobalConfig): void {
  const { instanceName, networkNamespace } = previous.control;
  data.control.instanceName = instanceName;
  data.control.networkNamespace.name = networkNamespace.name;
  if (instanceName !== undefined || networkNamespace.name !== undefined) {
    data.control.usePidDir = true;
  }
}

/**
 * Runs every line through the directive table against a fresh default
 * record and freezes the result.
 *
 * When `lines` is a {@link TokenLineSource}, block directives read their
 * entries from the lines that follow and unknown blocks are skipped;
 * otherwise blocks must be written on the directive's own line.
 *
 * @example
 * ```typescript
 * const { config, diagnostics } = runParsePass([
 *   TokenLine.of('router_id', 'lb-1'),
 *   TokenLine.of('vrrp_version', '3'),
 * ]);
 * config.mail.routerId; // 'lb-1'
 * ```
 */
export function runParsePass(
  lines: Iterable<TokenLine>,
  options: ParsePassOptions = {}
): ParsePassResult {
  const settings = options.settings ?? getDefaultSettings();
  const log = options.logger ?? defaultLogger;
  const table = options.table ?? buildDirectiveTable(settings.features);
  const collector = new DiagnosticCollector();
  const sink =
    options.diagnostics === undefined
      ? collector
      : new TeeDiagnosticSink(collector, options.diagnostics);

  const data = createDefaultGlobalData();
  if (options.previous !== undefined) {
    carryFrozenFields(data, options.previous);
  }

  const source = lines instanceof TokenLineSource ? lines : undefined;
  const ctx = createHandlerContext({
    data,
    reload: options.previous !== undefined,
    resolver: options.resolver ?? new StaticHostResolver(settings.hosts),
    blocks: source ?? inlineBlockReader,
    scheduler: {
      realtimePriority: {
        min: settings.scheduler.rt_priority_min,
        max: settings.scheduler.rt_priority_max,
      },
    },
    diagnostics: sink,
    ...(options.scriptUsers === undefined ? {} : { scriptUsers: options.scriptUsers }),
    ...(options.emails === undefined ? {} : { emails: options.emails }),
  });

  let count = 0;
  for (const line of lines) {
    const outcome = table.dispatch(line, ctx, source);
    log.debug('directive_dispatched', { directive: line.directive, outcome });
    count += 1;
  }

  const config = snapshotGlobalData(data);
  log.debug('parse_pass_completed', {
    lines: count,
    diagnostics: collector.diagnostics.length,
    reload: ctx.reload,
  });
  return { config, diagnostics: [...collector.diagnostics] };
}

/**
 * Tokenizes configuration text and runs a pass over it.
 */
export function parseGlobalDefs(text: string, options: ParsePassOptions = {}): ParsePassResult {
  return runParsePass(TokenLineSource.fromText(text), options);
}
