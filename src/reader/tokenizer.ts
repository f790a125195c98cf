/**
 * Splits one configuration line into tokens.
 *
 * @packageDocumentation
 */

const COMMENT_CHARS = new Set(['#', '!']);
const BRACES = new Set(['{', '}']);

/**
 * Tokenizes a line.
 *
 * - whitespace separates tokens
 * - `"…"` groups words into one token, without the quotes
 * - `#` or `!` outside quotes starts a comment running to the end of the line
 * - `{` and `}` outside quotes are always tokens of their own
 *
 * An unterminated quote runs to the end of the line.
 *
 * @example
 * ```typescript
 * tokenizeLine('notify_fifo_script "/usr/bin/notify --all" # comment');
 * // ['notify_fifo_script', '/usr/bin/notify --all']
 * tokenizeLine('notification_email {a@example.test}');
 * // ['notification_email', '{', 'a@example.test', '}']
 * ```
 */
export function tokenizeLine(text: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quoted = false;

  const flush = (): void => {
    if (inToken) {
      tokens.push(current);
    }
    current = '';
    inToken = false;
  };

  for (const char of text) {
    if (quoted) {
      if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
      continue;
    }
    if (char === '"') {
      quoted = true;
      inToken = true;
      continue;
    }
    if (COMMENT_CHARS.has(char)) {
      break;
    }
    if (/\s/.test(char)) {
      flush();
      continue;
    }
    if (BRACES.has(char)) {
      flush();
      tokens.push(char);
      continue;
    }
    current += char;
    inToken = true;
  }
  flush();

  return tokens;
}
