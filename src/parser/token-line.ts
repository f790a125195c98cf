/**
 * Read-only view of one directive occurrence.
 *
 * @packageDocumentation
 */

/**
 * The tokens of one configuration line. Token 0 is the directive name and
 * tokens 1..N are its arguments.
 *
 * A line may be empty, which models a directive invoked outside a textual
 * context; handlers treat such a line as a no-op.
 */
export class TokenLine {
  /** A line without tokens. */
  static readonly EMPTY = new TokenLine([]);

  private readonly tokens: readonly string[];

  private constructor(tokens: readonly string[]) {
    this.tokens = Object.freeze([...tokens]);
  }

  /**
   * Creates a line from already-split tokens.
   */
  static from(tokens: Iterable<string>): TokenLine {
    return new TokenLine([...tokens]);
  }

  /**
   * Creates a line from its tokens given as arguments.
   *
   * @example
   * ```typescript
   * const line = TokenLine.of('smtp_server', '192.0.2.25', '2525');
   * line.directive; // 'smtp_server'
   * line.at(2);     // '2525'
   * ```
   */
  static of(...tokens: string[]): TokenLine {
    return new TokenLine(tokens);
  }

  /** Number of tokens, directive name included. */
  get size(): number {
    return this.tokens.length;
  }

  /** Number of arguments after the directive name. */
  get argumentCount(): number {
    return Math.max(0, this.tokens.length - 1);
  }

  /** True when there is no directive name. */
  get isEmpty(): boolean {
    const first = this.tokens[0];
    return first === undefined || first === '';
  }

  /** The directive name, `''` for an empty line. */
  get directive(): string {
    return this.tokens[0] ?? '';
  }

  /**
   * Token at `index`, or `undefined` past the end.
   */
  at(index: number): string | undefined {
    return this.tokens[index];
  }

  /**
   * Tokens from `index` to the end.
   */
  from(index: number): readonly string[] {
    return this.tokens.slice(index);
  }

  toString(): string {
    return this.tokens.join(' ');
  }
}
