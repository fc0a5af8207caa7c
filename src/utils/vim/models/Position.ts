import type { Position, Range } from "../types";

export function comparePositions(a: Position, b: Position): number {
  if (a.row !== b.row) {
    return a.row - b.row;
  }
  return a.column - b.column;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.row === b.row && a.column === b.column;
}

export function normalizeRange(a: Position, b: Position): Range {
  return comparePositions(a, b) <= 0
    ? { start: { ...a }, end: { ...b } }
    : { start: { ...b }, end: { ...a } };
}

/** Column may sit one past the last character (insert/append position). */
export function clampPosition(lines: readonly string[], position: Position): Position {
  const row = clampRow(lines, position.row);
  const length = lines[row]?.length ?? 0;
  return { row, column: Math.min(Math.max(0, position.column), length) };
}

/** Column must sit on a character, as the Normal-mode cursor does. */
export function clampToCharacter(lines: readonly string[], position: Position): Position {
  const row = clampRow(lines, position.row);
  return { row, column: Math.min(Math.max(0, position.column), lastCharacterColumn(lines[row] ?? '')) };
}

export function clampRow(lines: readonly string[], row: number): number {
  return Math.min(Math.max(0, row), Math.max(0, lines.length - 1));
}

export function lastCharacterColumn(line: string): number {
  return Math.max(0, line.length - 1);
}
