/**
 * Header field folding (RFC 5322 section 2.2.3)
 *
 * @packageDocumentation
 */

/**
 * Recommended maximum line length, excluding the terminator (RFC 5322 2.1.1)
 */
export const MAX_FOLDED_LINE_LENGTH = 78;

/**
 * Any run of spaces or tabs followed by one or more other characters
 */
const FOLD_TOKEN_PATTERN = /[ \t]*[^ \t]+/g;

/**
 * Wraps a logical header line across multiple physical lines
 *
 * Tokens keep their leading whitespace, so a token that starts a new line
 * provides the folding indent itself. A single token longer than the limit
 * is never split.
 *
 * @param unfolded - Complete field, e.g. `Subject: some text`
 * @param terminator - `\r\n` or `\n`, matching the surrounding message
 * @returns Physical lines, each ending with `terminator`; empty for
 * all-whitespace input
 */
export function foldHeaderField(unfolded: string, terminator: string): string[] {
  const folded: string[] = [];

  for (const token of unfolded.match(FOLD_TOKEN_PATTERN) ?? []) {
    const last = folded.length - 1;
    if (last < 0) {
      folded.push(token);
    } else if (folded[last].length + token.length <= MAX_FOLDED_LINE_LENGTH) {
      folded[last] += token;
    } else {
      folded[last] += terminator;
      folded.push(token);
    }
  }

  if (folded.length > 0) {
    folded[folded.length - 1] += terminator;
  }
  return folded;
}

/**
 * Joins physical header lines back into one logical line by removing each
 * line's terminator (and nothing else)
 *
 * @param lines - Lines as produced by {@link foldHeaderField} or read from
 * a message
 */
export function unfoldHeaderLines(lines: readonly string[]): string {
  return lines.map(trimLineTerminator).join('');
}

/**
 * Removes a trailing `\r\n` or `\n`
 *
 * A lone `\r` is left alone; bare CR line endings are not recognized.
 */
export function trimLineTerminator(line: string): string {
  if (line.endsWith('\r\n')) return line.slice(0, -2);
  if (line.endsWith('\n')) return line.slice(0, -1);
  return line;
}
