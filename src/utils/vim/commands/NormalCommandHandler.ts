// src/utils/vim/commands/NormalCommandHandler.ts
import type { CommandContext, Position } from "../types";
import type { NormalCommand, OperatorName, InsertVariant } from "./CommandParser";
import type { VimMode, VisualMode } from "../models/VimMode";
import { isVisualMode } from "../models/VimMode";
import { comparePositions, clampToCharacter, positionsEqual } from "../models/Position";
import { applyMotion, isJumpMotion, moveWordEnd, moveWordForward } from "../operations/Motions";
import type { MotionName, MotionContext } from "../operations/Motions";
import {
  captureSpan,
  changeLines,
  deleteSpan,
  openLine,
  putText,
  replaceChars,
  selectionSpan,
  spanStart,
} from "../operations/TextOperations";
import type { TextSpan } from "../operations/TextOperations";
import { findNext, findPrevious, wordUnderCursor } from "../operations/SearchOperations";
import { firstNonBlankColumn, isWhitespace, isWordCharacter } from "../utils/WordClassifier";
import { isLinewise } from "../models/VimRegister";

/** Commands that read or write the active register. */
export function usesRegister(command: NormalCommand): boolean {
  switch (command.type) {
    case 'operator':
    case 'deleteChar':
    case 'deleteCharBefore':
    case 'deleteToLineEnd':
    case 'changeToLineEnd':
    case 'paste':
      return true;
    default:
      return false;
  }
}

/**
 * Runs parsed Normal-mode commands against the working copy in
 * `ctx.target`. `count` is 0 when none was typed.
 */
export class NormalCommandHandler {
  execute(command: NormalCommand, count: number, ctx: CommandContext): void {
    const n = Math.max(1, count);

    switch (command.type) {
      case 'motion':
        this.moveCursor(command.motion, count, ctx);
        return;
      case 'operator':
        this.applyOperator(command.operator, command.motion, count, ctx);
        return;
      case 'deleteChar': {
        const { row, column } = ctx.target.cursor;
        const length = ctx.target.lines[row].length;
        if (length === 0) {
          return;
        }
        this.deleteInto(ctx, {
          kind: 'chars',
          start: { row, column },
          end: { row, column: Math.min(column + n, length) },
        });
        this.clampCursor(ctx);
        return;
      }
      case 'deleteCharBefore': {
        const { row, column } = ctx.target.cursor;
        if (column === 0) {
          return;
        }
        this.deleteInto(ctx, {
          kind: 'chars',
          start: { row, column: Math.max(0, column - n) },
          end: { row, column },
        });
        return;
      }
      case 'deleteToLineEnd':
      case 'changeToLineEnd': {
        const { row, column } = ctx.target.cursor;
        const length = ctx.target.lines[row].length;
        if (column < length) {
          this.deleteInto(ctx, { kind: 'chars', start: { row, column }, end: { row, column: length } });
        }
        if (command.type === 'changeToLineEnd') {
          this.setMode(ctx, 'insert');
        } else {
          this.clampCursor(ctx);
        }
        return;
      }
      case 'paste': {
        const text = ctx.state.registers.get(ctx.state.activeRegister);
        const { row } = ctx.target.cursor;
        const before = ctx.target.lines.length;
        putText(ctx.target, text, command.before, n);
        const added = ctx.target.lines.length - before;
        if (added > 0) {
          ctx.state.marks.adjustForInsertedLines(command.before && isLinewise(text) ? row : row + 1, added);
        }
        return;
      }
      case 'replaceChar':
        replaceChars(ctx.target, command.char, n);
        return;
      case 'enterInsert':
        this.enterInsert(command.variant, ctx);
        return;
      case 'enterVisual':
        this.toggleVisual(command.mode, ctx);
        return;
      case 'enterReplace':
        this.setMode(ctx, 'replace');
        return;
      case 'searchNext': {
        const { pattern, direction } = ctx.state.search;
        const backward = (direction === 'backward') !== command.reverse;
        this.searchFrom(ctx.target.cursor, pattern, backward, n, ctx);
        return;
      }
      case 'searchWord': {
        const { row, column } = ctx.target.cursor;
        const word = wordUnderCursor(ctx.target.lines[row], column);
        if (!word) {
          return;
        }
        ctx.state.search = { pattern: word.text, direction: command.backward ? 'backward' : 'forward' };
        const from = command.backward ? { row, column: word.column } : ctx.target.cursor;
        this.searchFrom(from, word.text, command.backward, n, ctx);
        return;
      }
      case 'setMark':
        ctx.state.marks.setMark(command.name, ctx.target.cursor);
        return;
      case 'jumpToMark': {
        const mark = ctx.state.marks.getMark(command.name);
        if (!mark) {
          return;
        }
        ctx.state.marks.pushJump(ctx.target.cursor);
        const destination = clampToCharacter(ctx.target.lines, mark);
        ctx.target.cursor = command.exact
          ? destination
          : { row: destination.row, column: firstNonBlankColumn(ctx.target.lines[destination.row]) };
        return;
      }
      case 'startRecording':
        ctx.state.macros.startRecording(command.register);
        return;
      case 'stopRecording':
        ctx.state.macros.stopRecording();
        return;
      case 'selectRegister':
        ctx.state.activeRegister = command.register;
        return;
      case 'playMacro':
      case 'undo':
      case 'redo':
      case 'repeat':
      case 'enterCommandLine':
        throw new Error(`${command.type} is handled by the state machine`);
    }
  }

  /** d, c or y on the current visual selection; returns to Normal (Insert for c). */
  executeVisual(operator: OperatorName, ctx: CommandContext): void {
    const { mode, visualAnchor } = ctx.state;
    if (!isVisualMode(mode) || !visualAnchor) {
      return;
    }
    const span = selectionSpan(ctx.target.lines, mode, visualAnchor, ctx.target.cursor);

    switch (operator) {
      case 'yank':
        ctx.state.registers.recordYank(ctx.state.activeRegister, captureSpan(ctx.target.lines, span));
        ctx.target.cursor = spanStart(span);
        this.leaveVisual(ctx, 'normal');
        break;
      case 'delete':
        this.deleteInto(ctx, span);
        this.leaveVisual(ctx, 'normal');
        this.clampCursor(ctx);
        break;
      case 'change':
        if (span.kind === 'lines') {
          this.changeLinesInto(ctx, span.startRow, span.endRow);
        } else {
          this.deleteInto(ctx, span);
        }
        this.leaveVisual(ctx, 'insert');
        break;
    }
  }

  /** Visual `o`: the cursor moves to the other end of the selection. */
  swapVisualAnchor(ctx: CommandContext): void {
    const anchor = ctx.state.visualAnchor;
    if (!anchor) {
      return;
    }
    ctx.state.visualAnchor = { ...ctx.target.cursor };
    ctx.target.cursor = anchor;
  }

  leaveVisual(ctx: CommandContext, mode: VimMode): void {
    ctx.state.visualAnchor = null;
    this.setMode(ctx, mode);
  }

  motionContext(ctx: CommandContext): MotionContext {
    const document = ctx.document;
    return {
      pageSize: ctx.options.pageSize,
      matchBracket: document.matchBracket ? (position) => document.matchBracket?.(position) ?? null : undefined,
    };
  }

  private moveCursor(motion: MotionName, count: number, ctx: CommandContext): void {
    const from = ctx.target.cursor;
    const result = applyMotion(ctx.target.lines, from, motion, count || null, this.motionContext(ctx));
    if (isJumpMotion(motion) && !positionsEqual(from, result.position)) {
      ctx.state.marks.pushJump(from);
    }
    ctx.target.cursor = clampToCharacter(ctx.target.lines, result.position);
  }

  private applyOperator(
    operator: OperatorName,
    motion: MotionName | 'line',
    count: number,
    ctx: CommandContext
  ): void {
    const span = this.operatorSpan(operator, motion, count, ctx);
    if (!span) {
      return;
    }

    switch (operator) {
      case 'yank': {
        ctx.state.registers.recordYank(ctx.state.activeRegister, captureSpan(ctx.target.lines, span));
        const start = spanStart(span);
        ctx.target.cursor =
          span.kind === 'lines'
            ? clampToCharacter(ctx.target.lines, { row: start.row, column: ctx.target.cursor.column })
            : start;
        return;
      }
      case 'delete':
        this.deleteInto(ctx, span);
        this.clampCursor(ctx);
        return;
      case 'change':
        if (span.kind === 'lines') {
          this.changeLinesInto(ctx, span.startRow, span.endRow);
        } else {
          this.deleteInto(ctx, span);
        }
        this.setMode(ctx, 'insert');
        return;
    }
  }

  /** Region covered by an operator, or null when it covers nothing. */
  private operatorSpan(
    operator: OperatorName,
    motion: MotionName | 'line',
    count: number,
    ctx: CommandContext
  ): TextSpan | null {
    const { lines, cursor } = ctx.target;
    const n = Math.max(1, count);

    if (motion === 'line') {
      return { kind: 'lines', startRow: cursor.row, endRow: Math.min(lines.length - 1, cursor.row + n - 1) };
    }

    if (motion === 'wordForward') {
      return operator === 'change' ? this.changeWordSpan(lines, cursor, n) : this.wordSpan(lines, cursor, n);
    }

    // `l` as a target may reach past the last character, so `dl` works like `x`.
    if (motion === 'right') {
      const end = Math.min(cursor.column + n, lines[cursor.row].length);
      return end > cursor.column ? { kind: 'chars', start: { ...cursor }, end: { row: cursor.row, column: end } } : null;
    }

    const result = applyMotion(lines, cursor, motion, count || null, this.motionContext(ctx));
    const [first, second] =
      comparePositions(cursor, result.position) <= 0 ? [cursor, result.position] : [result.position, cursor];

    if (result.linewise) {
      return { kind: 'lines', startRow: first.row, endRow: second.row };
    }

    let end: Position = result.inclusive
      ? { row: second.row, column: Math.min(second.column + 1, lines[second.row].length) }
      : second;
    if (!result.inclusive && end.column === 0 && end.row > first.row) {
      end = { row: end.row - 1, column: lines[end.row - 1].length };
    }
    if (comparePositions(first, end) >= 0) {
      return null;
    }
    return { kind: 'chars', start: { ...first }, end };
  }

  /** dw / yw: like `w`, but never past the end of the starting line. */
  private wordSpan(lines: string[], cursor: Position, count: number): TextSpan | null {
    let target = cursor;
    for (let i = 0; i < count; i++) {
      target = moveWordForward(lines, target);
    }
    const length = lines[cursor.row].length;
    const end =
      target.row !== cursor.row || positionsEqual(target, cursor)
        ? { row: cursor.row, column: length }
        : target;
    return end.column > cursor.column ? { kind: 'chars', start: { ...cursor }, end } : null;
  }

  /**
   * cw on a word changes to the end of the word (as `ce` would); on
   * whitespace or punctuation it changes that run.
   */
  private changeWordSpan(lines: string[], cursor: Position, count: number): TextSpan | null {
    const line = lines[cursor.row];
    if (cursor.column >= line.length) {
      return null;
    }
    const classify = (ch: string): number => (isWordCharacter(ch) ? 0 : isWhitespace(ch) ? 1 : 2);
    const kind = classify(line[cursor.column]);

    let column = cursor.column;
    while (column + 1 < line.length && classify(line[column + 1]) === kind) {
      column++;
    }
    let last: Position = { row: cursor.row, column };
    for (let i = 1; i < count; i++) {
      last = moveWordEnd(lines, last);
    }
    return {
      kind: 'chars',
      start: { ...cursor },
      end: { row: last.row, column: Math.min(last.column + 1, lines[last.row].length) },
    };
  }

  private deleteInto(ctx: CommandContext, span: TextSpan): void {
    const text = deleteSpan(ctx.target, span);
    ctx.state.registers.recordDelete(ctx.state.activeRegister, text);
    if (span.kind === 'lines') {
      ctx.state.marks.adjustForDeletedLines(span.startRow, span.endRow - span.startRow + 1);
    } else if (span.kind === 'chars' && span.end.row > span.start.row) {
      // The rows after the first are joined onto it.
      ctx.state.marks.adjustForDeletedLines(span.start.row + 1, span.end.row - span.start.row);
    }
  }

  private changeLinesInto(ctx: CommandContext, startRow: number, endRow: number): void {
    const text = changeLines(ctx.target, startRow, endRow, ctx.state.settings.autoindent);
    ctx.state.registers.recordDelete(ctx.state.activeRegister, text);
    if (endRow > startRow) {
      ctx.state.marks.adjustForDeletedLines(startRow + 1, endRow - startRow);
    }
  }

  private enterInsert(variant: InsertVariant, ctx: CommandContext): void {
    const { row, column } = ctx.target.cursor;
    const line = ctx.target.lines[row];

    switch (variant) {
      case 'before':
        break;
      case 'lineStart':
        ctx.target.cursor = { row, column: firstNonBlankColumn(line) };
        break;
      case 'after':
        ctx.target.cursor = { row, column: Math.min(column + 1, line.length) };
        break;
      case 'lineEnd':
        ctx.target.cursor = { row, column: line.length };
        break;
      case 'openBelow':
      case 'openAbove':
        openLine(ctx.target, variant === 'openAbove', ctx.state.settings.autoindent);
        ctx.state.marks.adjustForInsertedLines(ctx.target.cursor.row, 1);
        break;
    }
    this.setMode(ctx, 'insert');
  }

  /** v, V and Ctrl+v: enter that mode, switch to it, or leave it if already there. */
  private toggleVisual(mode: VisualMode, ctx: CommandContext): void {
    const current = ctx.state.mode;
    if (current === mode) {
      this.leaveVisual(ctx, 'normal');
      return;
    }
    if (!isVisualMode(current) || !ctx.state.visualAnchor) {
      ctx.state.visualAnchor = { ...ctx.target.cursor };
    }
    this.setMode(ctx, mode);
  }

  private searchFrom(from: Position, pattern: string, backward: boolean, times: number, ctx: CommandContext): void {
    const options = { ignoreCase: ctx.state.settings.ignorecase };
    let position: Position | null = null;
    for (let i = 0; i < times; i++) {
      const found: Position | null = backward
        ? findPrevious(ctx.target.lines, position ?? from, pattern, options)
        : findNext(ctx.target.lines, position ?? from, pattern, options);
      if (!found) {
        break;
      }
      position = found;
    }
    if (!position) {
      return;
    }
    ctx.state.marks.pushJump(ctx.target.cursor);
    ctx.target.cursor = position;
  }

  private clampCursor(ctx: CommandContext): void {
    ctx.target.cursor = clampToCharacter(ctx.target.lines, ctx.target.cursor);
  }

  private setMode(ctx: CommandContext, mode: VimMode): void {
    ctx.state.mode = mode;
  }
}
