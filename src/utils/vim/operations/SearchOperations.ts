import type { Position } from "../types";
import { isWordCharacter } from "../utils/WordClassifier";

export interface SearchOptions {
  ignoreCase?: boolean;
}

function fold(text: string, options: SearchOptions): string {
  return options.ignoreCase ? text.toLowerCase() : text;
}

/**
 * First occurrence after `from`, scanning to the end of the document and
 * then wrapping from the top back to the cursor row.
 */
export function findNext(
  lines: readonly string[],
  from: Position,
  pattern: string,
  options: SearchOptions = {}
): Position | null {
  if (!pattern || lines.length === 0) {
    return null;
  }
  const needle = fold(pattern, options);

  const rest = fold(lines[from.row] ?? '', options).indexOf(needle, from.column + 1);
  if (rest >= 0) {
    return { row: from.row, column: rest };
  }

  for (let row = from.row + 1; row < lines.length; row++) {
    const column = fold(lines[row], options).indexOf(needle);
    if (column >= 0) {
      return { row, column };
    }
  }

  for (let row = 0; row <= from.row && row < lines.length; row++) {
    const column = fold(lines[row], options).indexOf(needle);
    if (column >= 0) {
      return { row, column };
    }
  }

  return null;
}

export function findPrevious(
  lines: readonly string[],
  from: Position,
  pattern: string,
  options: SearchOptions = {}
): Position | null {
  if (!pattern || lines.length === 0) {
    return null;
  }
  const needle = fold(pattern, options);

  if (from.column > 0) {
    const column = fold(lines[from.row] ?? '', options).lastIndexOf(needle, from.column - 1);
    if (column >= 0) {
      return { row: from.row, column };
    }
  }

  for (let row = from.row - 1; row >= 0; row--) {
    const column = fold(lines[row], options).lastIndexOf(needle);
    if (column >= 0) {
      return { row, column };
    }
  }

  for (let row = lines.length - 1; row >= from.row && row >= 0; row--) {
    const column = fold(lines[row], options).lastIndexOf(needle);
    if (column >= 0) {
      return { row, column };
    }
  }

  return null;
}

export interface WordAtCursor {
  text: string;
  column: number;
}

/** The word containing `column`, or the first one after it on the line. */
export function wordUnderCursor(line: string, column: number): WordAtCursor | null {
  let start = Math.max(0, column);
  while (start < line.length && !isWordCharacter(line[start])) {
    start++;
  }
  if (start >= line.length) {
    return null;
  }
  while (start > 0 && isWordCharacter(line[start - 1])) {
    start--;
  }
  let end = start;
  while (end < line.length && isWordCharacter(line[end])) {
    end++;
  }
  return { text: line.substring(start, end), column: start };
}
