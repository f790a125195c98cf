/**
 * Ordered token lines read from configuration text.
 *
 * @packageDocumentation
 */

import type { ValueBlockReader } from '../parser/context.js';
import type { BlockSkipper } from '../parser/registry.js';
import { TokenLine } from '../parser/token-line.js';
import { tokenizeLine } from './tokenizer.js';

/**
 * A cursor over token lines. Blank and comment-only lines are dropped when
 * the source is built; a line holding only `}` closes a section and is
 * skipped by {@link TokenLineSource.next}.
 *
 * The source is also the multi-line value block reader: a handler that reads
 * a block consumes the lines the block spans.
 */
export class TokenLineSource implements ValueBlockReader, BlockSkipper, Iterable<TokenLine> {
  private readonly lines: readonly TokenLine[];
  private position = 0;

  private constructor(lines: readonly TokenLine[]) {
    this.lines = lines;
  }

  /**
   * Tokenizes configuration text line by line.
   */
  static fromText(text: string): TokenLineSource {
    return TokenLineSource.fromTokens(text.split(/\r?\n/).map(tokenizeLine));
  }

  /**
   * Wraps lines that are already tokenized.
   */
  static fromTokens(lines: Iterable<Iterable<string>>): TokenLineSource {
    const kept: TokenLine[] = [];
    for (const tokens of lines) {
      const line = TokenLine.from(tokens);
      if (line.size > 0) {
        kept.push(line);
      }
    }
    return new TokenLineSource(kept);
  }

  /**
   * The next directive line, or `undefined` at the end.
   */
  next(): TokenLine | undefined {
    while (this.position < this.lines.length) {
      const line = this.lines[this.position];
      this.position += 1;
      if (line !== undefined && !isLoneCloser(line)) {
        return line;
      }
    }
    return undefined;
  }

  /**
   * Reads the entries of the block a directive opens. The `{` may end the
   * directive's line or start the line after it.
   */
  readValueBlock(line: TokenLine): readonly string[] | undefined {
    let first: readonly string[];
    if (line.at(1) === '{') {
      first = line.from(2);
    } else if (line.argumentCount === 0 && this.lines[this.position]?.directive === '{') {
      first = this.lines[this.position]?.from(1) ?? [];
      this.position += 1;
    } else {
      return undefined;
    }
    const entries: string[] = [];
    if (collectUntilCloser(first, entries)) {
      return entries;
    }
    while (this.position < this.lines.length) {
      const next = this.lines[this.position];
      this.position += 1;
      if (next !== undefined && collectUntilCloser(next.from(0), entries)) {
        break;
      }
    }
    return entries;
  }

  /**
   * Skips the lines of a block whose `{` has just been read, nested blocks
   * included.
   */
  skipBlock(): void {
    let depth = 1;
    while (depth > 0 && this.position < this.lines.length) {
      const line = this.lines[this.position];
      this.position += 1;
      for (const token of line?.from(0) ?? []) {
        if (token === '{') {
          depth += 1;
        } else if (token === '}') {
          depth -= 1;
        }
      }
    }
  }

  *[Symbol.iterator](): Iterator<TokenLine> {
    let line = this.next();
    while (line !== undefined) {
      yield line;
      line = this.next();
    }
  }
}

function isLoneCloser(line: TokenLine): boolean {
  return line.size === 1 && line.directive === '}';
}

/**
 * Appends tokens to `entries` up to a `}`.
 *
 * @returns Whether a `}` was found.
 */
function collectUntilCloser(tokens: readonly string[], entries: string[]): boolean {
  for (const token of tokens) {
    if (token === '}') {
      return true;
    }
    entries.push(token);
  }
  return false;
}
