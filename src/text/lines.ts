const LINE_BREAK = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/g;

/**
 * Split `text` into lines. With `keepEnds` each line keeps its terminator;
 * a trailing terminator does not produce an empty final line.
 */
export function splitLines(text: string, keepEnds = false): string[] {
  const lines: string[] = [];
  let start = 0;
  LINE_BREAK.lastIndex = 0;
  for (let match = LINE_BREAK.exec(text); match !== null; match = LINE_BREAK.exec(text)) {
    const end = match.index + match[0].length;
    lines.push(text.slice(start, keepEnds ? end : match.index));
    start = end;
  }
  if (start < text.length) {
    lines.push(text.slice(start));
  }
  return lines;
}

/** True when `line` ends in a line terminator. */
export function hasLineEnding(line: string): boolean {
  if (line.length === 0) return false;
  return /[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]$/.test(line);
}
