/**
 * Line splitting that keeps each line's own terminator, so that
 * `joinLines(splitLines(text))` always reproduces `text`, mixed line
 * endings included. Empty text has no lines.
 */

export interface SplitText {
  lines: string[];
  /** Terminator after each line: `\n`, `\r\n`, or `''` for an unterminated last line. */
  terminators: string[];
}

export function splitLines(text: string): SplitText {
  const lines: string[] = [];
  const terminators: string[] = [];
  const breaks = /\r?\n/g;
  let start = 0;
  let match: RegExpExecArray | null;

  while ((match = breaks.exec(text)) !== null) {
    lines.push(text.slice(start, match.index));
    terminators.push(match[0]);
    start = match.index + match[0].length;
  }
  if (start < text.length) {
    lines.push(text.slice(start));
    terminators.push('');
  }
  return { lines, terminators };
}

export function joinLines({ lines, terminators }: SplitText): string {
  return lines.map((line, i) => line + (terminators[i] ?? '')).join('');
}
