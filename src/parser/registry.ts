/**
 * The directive table: directive name to handler, built once per feature
 * set.
 *
 * @packageDocumentation
 */

import type { FeatureFlags } from '../config/types.js';
import type { HandlerContext } from './context.js';
import type { DirectiveDefinition } from './directive.js';
import { allDirectives } from './handlers/index.js';
import type { TokenLine } from './token-line.js';

/**
 * Error thrown when two definitions share a name.
 */
export class DuplicateDirectiveError extends Error {
  /** The name registered twice. */
  public readonly directive: string;

  constructor(directive: string) {
    super(`Directive '${directive}' is registered more than once`);
    this.name = 'DuplicateDirectiveError';
    this.directive = directive;
  }
}

/**
 * What {@link DirectiveTable.dispatch} did with a line.
 *
 * - `handled`: the directive's handler ran
 * - `frozen`: the directive is frozen on reload and was skipped
 * - `unknown`: no directive of that name exists in this table
 * - `empty`: the line had no directive name
 */
export type DispatchOutcome = 'handled' | 'frozen' | 'unknown' | 'empty';

/**
 * Hook that skips the nested block an unknown directive opens.
 */
export interface BlockSkipper {
  skipBlock(): void;
}

/**
 * Immutable name-to-definition lookup.
 */
export class DirectiveTable {
  private readonly definitions: ReadonlyMap<string, DirectiveDefinition>;

  /**
   * @throws DuplicateDirectiveError if two definitions share a name.
   */
  constructor(definitions: Iterable<DirectiveDefinition>) {
    const map = new Map<string, DirectiveDefinition>();
    for (const definition of definitions) {
      if (map.has(definition.name)) {
        throw new DuplicateDirectiveError(definition.name);
      }
      map.set(definition.name, definition);
    }
    this.definitions = map;
  }

  get size(): number {
    return this.definitions.size;
  }

  get(name: string): DirectiveDefinition | undefined {
    return this.definitions.get(name);
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  /** Registered names, sorted. */
  names(): string[] {
    return [...this.definitions.keys()].sort();
  }

  /**
   * Routes one line to its handler.
   *
   * An unknown directive is reported once and changes nothing. When it opens
   * a block (its last token is `{`), `blocks` is asked to skip that block.
   */
  dispatch(line: TokenLine, ctx: HandlerContext, blocks?: BlockSkipper): DispatchOutcome {
    if (line.isEmpty) {
      return 'empty';
    }
    const definition = this.definitions.get(line.directive);
    if (definition === undefined) {
      ctx.report(line.directive, `Unknown keyword '${line.directive}'`);
      if (blocks !== undefined && line.at(line.size - 1) === '{') {
        blocks.skipBlock();
      }
      return 'unknown';
    }
    if (ctx.reload && definition.frozenOnReload) {
      return 'frozen';
    }
    definition.handle(line, ctx);
    return 'handled';
  }
}

/**
 * Builds the table for a feature set: a definition is present only when
 * every feature it names is enabled.
 *
 * @throws DuplicateDirectiveError if two definitions share a name.
 */
export function buildDirectiveTable(features: Readonly<FeatureFlags>): DirectiveTable {
  return new DirectiveTable(
    allDirectives(features).filter((definition) =>
      definition.features.every((feature) => features[feature])
    )
  );
}
