import type { EditTarget, Position, Range } from "../types";
import type { VisualMode } from "../models/VimMode";
import { isLinewise, toLinewiseText } from "../models/VimRegister";
import { clampPosition, normalizeRange } from "../models/Position";
import { firstNonBlankColumn, getIndentation } from "../utils/WordClassifier";

/**
 * Region an operator acts on.
 * - `lines`: whole rows, both ends inclusive.
 * - `chars`: from `start` up to but excluding `end`, may span rows.
 * - `block`: the same column slice of every row, `endColumn` exclusive.
 */
export type TextSpan =
  | { kind: 'lines'; startRow: number; endRow: number }
  | { kind: 'chars'; start: Position; end: Position }
  | { kind: 'block'; startRow: number; endRow: number; startColumn: number; endColumn: number };

/** Charwise selections include the character under the cursor. */
export function selectionSpan(
  lines: readonly string[],
  mode: VisualMode,
  anchor: Position,
  cursor: Position
): TextSpan {
  const { start, end } = normalizeRange(anchor, cursor);
  switch (mode) {
    case 'visual':
      return {
        kind: 'chars',
        start,
        end: { row: end.row, column: Math.min(end.column + 1, (lines[end.row] ?? '').length) },
      };
    case 'visual-line':
      return { kind: 'lines', startRow: start.row, endRow: end.row };
    case 'visual-block':
      return {
        kind: 'block',
        startRow: start.row,
        endRow: end.row,
        startColumn: Math.min(anchor.column, cursor.column),
        endColumn: Math.max(anchor.column, cursor.column) + 1,
      };
  }
}

/** Range handed to the document's selection display. */
export function spanToRange(lines: readonly string[], span: TextSpan): Range {
  switch (span.kind) {
    case 'lines':
      return {
        start: { row: span.startRow, column: 0 },
        end: { row: span.endRow, column: (lines[span.endRow] ?? '').length },
      };
    case 'chars':
      return { start: { ...span.start }, end: { ...span.end } };
    case 'block':
      return {
        start: { row: span.startRow, column: span.startColumn },
        end: { row: span.endRow, column: span.endColumn },
      };
  }
}

/** Top-left position of a span. */
export function spanStart(span: TextSpan): Position {
  switch (span.kind) {
    case 'lines':
      return { row: span.startRow, column: 0 };
    case 'chars':
      return { ...span.start };
    case 'block':
      return { row: span.startRow, column: span.startColumn };
  }
}

export function captureSpan(lines: readonly string[], span: TextSpan): string {
  switch (span.kind) {
    case 'lines':
      return toLinewiseText(lines.slice(span.startRow, span.endRow + 1));
    case 'chars': {
      const { start, end } = span;
      if (start.row === end.row) {
        return (lines[start.row] ?? '').substring(start.column, end.column);
      }
      const parts = [(lines[start.row] ?? '').substring(start.column)];
      for (let row = start.row + 1; row < end.row; row++) {
        parts.push(lines[row]);
      }
      parts.push((lines[end.row] ?? '').substring(0, end.column));
      return parts.join('\n');
    }
    case 'block': {
      const rows: string[] = [];
      for (let row = span.startRow; row <= span.endRow; row++) {
        rows.push((lines[row] ?? '').substring(span.startColumn, span.endColumn));
      }
      return rows.join('\n');
    }
  }
}

/**
 * Removes the span from the target and returns what was removed. The cursor
 * goes to the start of the span (first non-blank of the surviving row for a
 * linewise delete).
 */
export function deleteSpan(target: EditTarget, span: TextSpan): string {
  const text = captureSpan(target.lines, span);

  switch (span.kind) {
    case 'lines': {
      target.lines.splice(span.startRow, span.endRow - span.startRow + 1);
      if (target.lines.length === 0) {
        target.lines.push('');
      }
      const row = Math.min(span.startRow, target.lines.length - 1);
      target.cursor = { row, column: firstNonBlankColumn(target.lines[row]) };
      break;
    }
    case 'chars': {
      const { start, end } = span;
      const head = (target.lines[start.row] ?? '').substring(0, start.column);
      const tail = (target.lines[end.row] ?? '').substring(end.column);
      target.lines.splice(start.row, end.row - start.row + 1, head + tail);
      target.cursor = { ...start };
      break;
    }
    case 'block': {
      for (let row = span.startRow; row <= span.endRow && row < target.lines.length; row++) {
        const line = target.lines[row];
        target.lines[row] = line.substring(0, span.startColumn) + line.substring(span.endColumn);
      }
      target.cursor = { row: span.startRow, column: span.startColumn };
      break;
    }
  }

  target.changed = target.changed || text.length > 0;
  return text;
}

/**
 * Replaces rows `startRow..endRow` with one empty line (indented like the
 * first row when `keepIndent` is set). Returns the removed lines.
 */
export function changeLines(target: EditTarget, startRow: number, endRow: number, keepIndent: boolean): string {
  const text = captureSpan(target.lines, { kind: 'lines', startRow, endRow });
  const indent = keepIndent ? getIndentation(target.lines[startRow] ?? '') : '';
  target.lines.splice(startRow, endRow - startRow + 1, indent);
  target.cursor = { row: startRow, column: indent.length };
  target.changed = true;
  return text;
}

/**
 * p / P. Whole-line text becomes new rows below (or above) the cursor row;
 * anything else goes after (or at) the cursor column.
 */
export function putText(target: EditTarget, text: string, before: boolean, count: number): boolean {
  if (text === '') {
    return false;
  }
  const times = Math.max(1, count);
  const { row, column } = target.cursor;

  if (isLinewise(text)) {
    const block = text.slice(0, -1).split('\n');
    const inserted: string[] = [];
    for (let i = 0; i < times; i++) {
      inserted.push(...block);
    }
    const insertRow = before ? row : row + 1;
    target.lines.splice(insertRow, 0, ...inserted);
    target.cursor = { row: insertRow, column: firstNonBlankColumn(target.lines[insertRow]) };
    target.changed = true;
    return true;
  }

  const line = target.lines[row] ?? '';
  const at = before ? Math.min(column, line.length) : Math.min(column + 1, line.length);
  const pieces = text.repeat(times).split('\n');
  const head = line.substring(0, at);
  const tail = line.substring(at);

  if (pieces.length === 1) {
    target.lines[row] = head + pieces[0] + tail;
    target.cursor = { row, column: at + pieces[0].length - 1 };
  } else {
    const last = pieces[pieces.length - 1];
    const rows = [head + pieces[0], ...pieces.slice(1, -1), last + tail];
    target.lines.splice(row, 1, ...rows);
    target.cursor = { row: row + pieces.length - 1, column: Math.max(0, last.length - 1) };
  }
  target.changed = true;
  return true;
}

/** r: overwrite `count` characters; nothing happens when the line is too short. */
export function replaceChars(target: EditTarget, ch: string, count: number): boolean {
  const { row, column } = target.cursor;
  const line = target.lines[row] ?? '';
  const span = Math.max(1, count);
  if (column + span > line.length) {
    return false;
  }
  target.lines[row] = line.substring(0, column) + ch.repeat(span) + line.substring(column + span);
  target.cursor = { row, column: column + span - 1 };
  target.changed = true;
  return true;
}

export function openLine(target: EditTarget, above: boolean, autoIndent: boolean): void {
  const row = target.cursor.row;
  const indent = autoIndent ? getIndentation(target.lines[row] ?? '') : '';
  const newRow = above ? row : row + 1;
  target.lines.splice(newRow, 0, indent);
  target.cursor = { row: newRow, column: indent.length };
  target.changed = true;
}

/** Replace mode: overwrite the character under the cursor, append past the end. */
export function overwriteChar(target: EditTarget, ch: string): void {
  const { row, column } = target.cursor;
  const line = target.lines[row] ?? '';
  target.lines[row] = line.substring(0, column) + ch + line.substring(column + 1);
  target.cursor = { row, column: column + 1 };
  target.changed = true;
}

export function insertText(target: EditTarget, text: string): void {
  const { row, column } = clampPosition(target.lines, target.cursor);
  const line = target.lines[row] ?? '';
  target.lines[row] = line.substring(0, column) + text + line.substring(column);
  target.cursor = { row, column: column + text.length };
  target.changed = true;
}

export function splitLine(target: EditTarget, autoIndent: boolean): void {
  const { row, column } = clampPosition(target.lines, target.cursor);
  const line = target.lines[row] ?? '';
  const indent = autoIndent ? getIndentation(line) : '';
  target.lines.splice(row, 1, line.substring(0, column), indent + line.substring(column));
  target.cursor = { row: row + 1, column: indent.length };
  target.changed = true;
}

/** Insert-mode Backspace; at column 0 the row is joined onto the previous one. */
export function deleteBackward(target: EditTarget): void {
  const { row, column } = clampPosition(target.lines, target.cursor);
  const line = target.lines[row] ?? '';

  if (column > 0) {
    target.lines[row] = line.substring(0, column - 1) + line.substring(column);
    target.cursor = { row, column: column - 1 };
    target.changed = true;
  } else if (row > 0) {
    const previous = target.lines[row - 1];
    target.lines.splice(row - 1, 2, previous + line);
    target.cursor = { row: row - 1, column: previous.length };
    target.changed = true;
  }
}
