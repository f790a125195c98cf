/**
 * The diagnostics channel.
 *
 * Every rejected line and every corrective decision (clamp, duplicate,
 * deprecation) produces exactly one {@link Diagnostic}.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';

/**
 * Severity of a diagnostic.
 *
 * - `info`: the line was handled, possibly with a correction, or a policy applied
 * - `error`: the line, or part of it, was rejected
 */
export type DiagnosticLevel = 'info' | 'error';

/**
 * One message about one directive occurrence.
 */
export interface Diagnostic {
  readonly level: DiagnosticLevel;
  /** Directive the message is about. */
  readonly directive: string;
  readonly message: string;
}

/**
 * Write-only destination for diagnostics.
 */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

/**
 * Keeps diagnostics in the order they were reported.
 */
export class DiagnosticCollector implements DiagnosticSink {
  private readonly entries: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
  }

  /** Everything reported so far. */
  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  /** Whether any error-level diagnostic was reported. */
  get hasErrors(): boolean {
    return this.entries.some((entry) => entry.level === 'error');
  }
}

/**
 * Forwards diagnostics to a {@link Logger} as `directive_diagnostic` events.
 *
 * `info` diagnostics are logged at info level and `error` diagnostics at
 * warn level: a rejected line never stops the pass.
 */
export class LoggerDiagnosticSink implements DiagnosticSink {
  constructor(private readonly logger: Pick<Logger, 'info' | 'warn'>) {}

  report(diagnostic: Diagnostic): void {
    const data = { directive: diagnostic.directive, message: diagnostic.message };
    if (diagnostic.level === 'error') {
      this.logger.warn('directive_diagnostic', data);
    } else {
      this.logger.info('directive_diagnostic', data);
    }
  }
}

/**
 * Forwards each diagnostic to every wrapped sink, in order.
 */
export class TeeDiagnosticSink implements DiagnosticSink {
  private readonly sinks: readonly DiagnosticSink[];

  constructor(...sinks: DiagnosticSink[]) {
    this.sinks = sinks;
  }

  report(diagnostic: Diagnostic): void {
    for (const sink of this.sinks) {
      sink.report(diagnostic);
    }
  }
}

/**
 * Formats a diagnostic as `<level> <directive>: <message>`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.level} ${diagnostic.directive}: ${diagnostic.message}`;
}
