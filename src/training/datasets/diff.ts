/**
 * Git diff preprocessing.
 *
 * Input is a whitespace-tokenized diff whose lines are joined by `<nl>`.
 * Unchanged context lines and index/similarity metadata are dropped; each
 * kept line is followed by a literal `\n` token.
 *
 * @module training/datasets/diff
 */

const LINE_DELIMITER = '<nl>';
const LINE_BREAK_TOKEN = '\\n';

function startsWith(tokens: readonly string[], ...prefix: string[]): boolean {
  return prefix.every((token, i) => tokens[i] === token);
}

/**
 * Tokens to keep for one diff line, or null to drop it.
 */
function keepLine(tokens: readonly string[]): string[] | null {
  if (tokens.length === 0) return null;

  if (tokens[0] === '<FILE>') return tokens.slice(1);
  if (startsWith(tokens, 'deleted', 'file')) return tokens.slice(0, 2);
  if (
    startsWith(tokens, 'new', 'file') ||
    startsWith(tokens, 'rename', 'from') ||
    startsWith(tokens, 'rename', 'to') ||
    startsWith(tokens, 'Binary', 'files') ||
    tokens[0] === '-' ||
    tokens[0] === '+'
  ) {
    return tokens.slice();
  }
  // index lines, similarity index, unchanged context
  return null;
}

export function tokenizeDiffLines(diff: string): string[][] {
  return diff.split(LINE_DELIMITER).map((line) => line.split(/\s+/).filter(Boolean));
}

export function processDiff(diff: string): string {
  const kept: string[] = [];
  for (const tokens of tokenizeDiffLines(diff)) {
    const line = keepLine(tokens);
    if (line) kept.push(...line, LINE_BREAK_TOKEN);
  }
  return kept.join(' ');
}
