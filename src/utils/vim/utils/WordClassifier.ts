const PUNCTUATION_BOUNDARIES = new Set([
  '.', ',', ';', ':', '!', '?', '"', "'", '(', ')', '[', ']', '{', '}', '<', '>',
]);

const TAB_WIDTH = 4;

export function isWhitespace(ch: string): boolean {
  return /^\s$/.test(ch);
}

export function isWordBoundary(ch: string): boolean {
  return isWhitespace(ch) || PUNCTUATION_BOUNDARIES.has(ch);
}

export function isWordCharacter(ch: string): boolean {
  return ch.length > 0 && !isWordBoundary(ch);
}

/** Spaces count 1, tabs count 4; the total is expressed in 4-column steps. */
export function indentLevel(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === ' ') {
      width++;
    } else if (ch === '\t') {
      width += TAB_WIDTH;
    } else {
      break;
    }
  }
  return Math.floor(width / TAB_WIDTH);
}

export function getIndentation(line: string): string {
  const match = line.match(/^[ \t]*/);
  return match ? match[0] : '';
}

export function firstNonBlankColumn(line: string): number {
  const indentation = getIndentation(line);
  return indentation.length < line.length ? indentation.length : 0;
}
