/**
 * Directive dispatch and validation.
 *
 * @packageDocumentation
 */

export { TokenLine } from './token-line.js';
export {
  DiagnosticCollector,
  formatDiagnostic,
  LoggerDiagnosticSink,
  TeeDiagnosticSink,
} from './diagnostics.js';
export type { Diagnostic, DiagnosticLevel, DiagnosticSink } from './diagnostics.js';
export { createHandlerContext, inlineBlockReader, posixScriptUserLookup } from './context.js';
export type {
  EmailAccumulator,
  HandlerContext,
  HandlerContextOptions,
  SchedulerLimits,
  ScriptUserLookup,
  ValueBlockReader,
} from './context.js';
export {
  defineDirective,
  integerDirective,
  requireArguments,
  stringDirective,
  toggleDirective,
} from './directive.js';
export type { DirectiveDefinition, DirectiveHandler, DirectiveOptions } from './directive.js';
export { integerSubOption, scanSubOptions } from './sub-options.js';
export type { SubOption, SubOptionOutcome, SubOptionScan } from './sub-options.js';
export { allDirectives } from './handlers/index.js';
export { buildDirectiveTable, DirectiveTable, DuplicateDirectiveError } from './registry.js';
export type { BlockSkipper, DispatchOutcome } from './registry.js';
export { parseGlobalDefs, runParsePass } from './pass.js';
export type { ParsePassOptions, ParsePassResult } from './pass.js';
