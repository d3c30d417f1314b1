// src/help/word-wrap.ts

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word !== '');
}

/**
 * Greedy word wrap for a block that starts at `startColumn` on its first line.
 * Returns the block's lines without the leading `startColumn` spaces, which
 * the caller supplies (label on the first line, indentation after).
 *
 * A word moves to a new line when it would end past `lineWidth`, unless it
 * would be the first word on its line: a word wider than the space available
 * gets a line to itself rather than an empty line before it.
 */
export function wrapWords(words: readonly string[], startColumn: number, lineWidth: number): string[] {
  const lines: string[] = [];
  let line = '';
  let column = startColumn;

  for (const word of words) {
    if (column === startColumn) {
      line = word;
      column += word.length;
      continue;
    }

    if (column + 1 + word.length > lineWidth) {
      lines.push(line);
      line = word;
      column = startColumn + word.length;
      continue;
    }

    line += ` ${word}`;
    column += 1 + word.length;
  }

  if (line !== '') lines.push(line);
  return lines;
}
