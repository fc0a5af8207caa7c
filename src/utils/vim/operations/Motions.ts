import type { Position } from "../types";
import { clampRow, clampToCharacter, lastCharacterColumn } from "../models/Position";
import { firstNonBlankColumn, isWordBoundary } from "../utils/WordClassifier";

export type MotionName =
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'wordForward'
  | 'wordBackward'
  | 'wordEnd'
  | 'lineStart'
  | 'lineEnd'
  | 'firstNonBlank'
  | 'firstLine'
  | 'lastLine'
  | 'matchingBracket'
  | 'halfPageDown'
  | 'halfPageUp'
  | 'pageDown'
  | 'pageUp';

export interface MotionResult {
  position: Position;
  /** Operators act on whole lines (j, k, G, gg, paging). */
  linewise: boolean;
  /** Operators include the target character (e, $, %). */
  inclusive: boolean;
}

export interface MotionContext {
  pageSize: number;
  matchBracket?: (position: Position) => Position | null;
}

const LINEWISE_MOTIONS = new Set<MotionName>([
  'up', 'down', 'firstLine', 'lastLine', 'halfPageDown', 'halfPageUp', 'pageDown', 'pageUp',
]);

const INCLUSIVE_MOTIONS = new Set<MotionName>(['wordEnd', 'lineEnd', 'matchingBracket']);

const JUMP_MOTIONS = new Set<MotionName>(['firstLine', 'lastLine', 'matchingBracket']);

export function isJumpMotion(motion: MotionName): boolean {
  return JUMP_MOTIONS.has(motion);
}

/**
 * `count` is null when the user typed none. Repeating motions treat that
 * as 1; G and gg treat a count as an absolute line number.
 */
export function applyMotion(
  lines: readonly string[],
  from: Position,
  motion: MotionName,
  count: number | null,
  context: MotionContext
): MotionResult {
  const times = count && count > 0 ? count : 1;
  const result = (position: Position): MotionResult => ({
    position,
    linewise: LINEWISE_MOTIONS.has(motion),
    inclusive: INCLUSIVE_MOTIONS.has(motion),
  });

  switch (motion) {
    case 'left':
      return result(repeat(times, from, (p) => moveLeft(lines, p)));
    case 'right':
      return result(repeat(times, from, (p) => moveRight(lines, p)));
    case 'up':
      return result(moveVertical(lines, from, -times));
    case 'down':
      return result(moveVertical(lines, from, times));
    case 'wordForward':
      return result(repeat(times, from, (p) => moveWordForward(lines, p)));
    case 'wordBackward':
      return result(repeat(times, from, (p) => moveWordBackward(lines, p)));
    case 'wordEnd':
      return result(repeat(times, from, (p) => moveWordEnd(lines, p)));
    case 'lineStart':
      return result({ row: from.row, column: 0 });
    case 'lineEnd':
      return result({ row: from.row, column: lastCharacterColumn(lines[from.row] ?? '') });
    case 'firstNonBlank':
      return result({ row: from.row, column: firstNonBlankColumn(lines[from.row] ?? '') });
    case 'firstLine':
      return result(goToLine(lines, count && count > 0 ? count : 1));
    case 'lastLine':
      return result(goToLine(lines, count && count > 0 ? count : lines.length));
    case 'matchingBracket': {
      const matcher = context.matchBracket ?? ((p: Position) => findMatchingBracket(lines, p));
      return result(matcher(from) ?? from);
    }
    case 'halfPageDown':
      return result(moveVertical(lines, from, Math.max(1, Math.floor(context.pageSize / 2)) * times));
    case 'halfPageUp':
      return result(moveVertical(lines, from, -Math.max(1, Math.floor(context.pageSize / 2)) * times));
    case 'pageDown':
      return result(moveVertical(lines, from, context.pageSize * times));
    case 'pageUp':
      return result(moveVertical(lines, from, -context.pageSize * times));
  }
}

function repeat(times: number, from: Position, step: (position: Position) => Position): Position {
  let position = from;
  for (let i = 0; i < times; i++) {
    position = step(position);
  }
  return position;
}

export function moveLeft(lines: readonly string[], position: Position): Position {
  return { row: position.row, column: Math.max(0, position.column - 1) };
}

export function moveRight(lines: readonly string[], position: Position): Position {
  const last = lastCharacterColumn(lines[position.row] ?? '');
  return { row: position.row, column: Math.min(last, position.column + 1) };
}

export function moveVertical(lines: readonly string[], position: Position, delta: number): Position {
  return clampToCharacter(lines, { row: clampRow(lines, position.row + delta), column: position.column });
}

export function moveWordForward(lines: readonly string[], position: Position): Position {
  const line = lines[position.row] ?? '';
  let col = position.column;

  while (col < line.length && !isWordBoundary(line[col])) {
    col++;
  }
  while (col < line.length && isWordBoundary(line[col])) {
    col++;
  }

  if (col < line.length) {
    return { row: position.row, column: col };
  }
  if (position.row < lines.length - 1) {
    return { row: position.row + 1, column: 0 };
  }
  return position;
}

export function moveWordBackward(lines: readonly string[], position: Position): Position {
  if (position.column > 0) {
    const line = lines[position.row] ?? '';
    let col = Math.min(position.column, line.length) - 1;

    while (col > 0 && isWordBoundary(line[col])) {
      col--;
    }
    while (col > 0 && !isWordBoundary(line[col - 1])) {
      col--;
    }
    return { row: position.row, column: Math.max(0, col) };
  }
  if (position.row > 0) {
    const row = position.row - 1;
    return { row, column: lastCharacterColumn(lines[row] ?? '') };
  }
  return position;
}

export function moveWordEnd(lines: readonly string[], position: Position): Position {
  let row = position.row;
  let col = position.column + 1;

  for (;;) {
    const line = lines[row] ?? '';
    while (col < line.length && isWordBoundary(line[col])) {
      col++;
    }
    if (col < line.length) {
      while (col < line.length && !isWordBoundary(line[col])) {
        col++;
      }
      return { row, column: col - 1 };
    }
    if (row >= lines.length - 1) {
      return position;
    }
    row++;
    col = 0;
  }
}

/** 1-based line number, clamped to the document. */
export function goToLine(lines: readonly string[], lineNumber: number): Position {
  const row = Math.min(Math.max(1, lineNumber), Math.max(1, lines.length)) - 1;
  return { row, column: 0 };
}

const BRACKET_PAIRS: Record<string, { partner: string; forward: boolean }> = {
  '(': { partner: ')', forward: true },
  '[': { partner: ']', forward: true },
  '{': { partner: '}', forward: true },
  ')': { partner: '(', forward: false },
  ']': { partner: '[', forward: false },
  '}': { partner: '{', forward: false },
};

/** Bracket under the cursor, or the one just left of it. */
export function findMatchingBracket(lines: readonly string[], position: Position): Position | null {
  const line = lines[position.row] ?? '';
  for (const column of [position.column, position.column - 1]) {
    if (column < 0 || column >= line.length) {
      continue;
    }
    const bracket = BRACKET_PAIRS[line[column]];
    if (bracket) {
      return scanForPartner(lines, { row: position.row, column }, line[column], bracket.partner, bracket.forward);
    }
  }
  return null;
}

function scanForPartner(
  lines: readonly string[],
  origin: Position,
  self: string,
  partner: string,
  forward: boolean
): Position | null {
  let depth = 0;
  let row = origin.row;
  let col = origin.column;

  while (row >= 0 && row < lines.length) {
    const line = lines[row];
    while (col >= 0 && col < line.length) {
      const ch = line[col];
      if (ch === self) {
        depth++;
      } else if (ch === partner) {
        depth--;
        if (depth === 0) {
          return { row, column: col };
        }
      }
      col += forward ? 1 : -1;
    }
    row += forward ? 1 : -1;
    if (row >= 0 && row < lines.length) {
      col = forward ? 0 : lines[row].length - 1;
    }
  }
  return null;
}
