/**
 * Split raw metadata text into lines.
 *
 * Accepts `\n`, `\r\n` and `\r` line endings. A trailing newline does not
 * produce an extra empty line.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Lazily yield each line with leading and trailing whitespace removed.
 *
 * Order is preserved and blank lines are kept.
 */
export function* scanner(content: Iterable<string>): Generator<string> {
  for (const line of content) {
    yield line.trim();
  }
}
