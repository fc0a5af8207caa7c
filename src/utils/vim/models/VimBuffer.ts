// src/utils/vim/models/VimBuffer.ts
import type { Position, Range, TextDocument } from "../types";
import { clampPosition } from "./Position";

interface Snapshot {
  lines: string[];
  cursor: Position;
}

/**
 * In-memory TextDocument: a line array, a cursor, a modified flag and a
 * snapshot history for undo/redo.
 */
export class MemoryBuffer implements TextDocument {
  private content: string[];
  private cursor: Position = { row: 0, column: 0 };
  private modified = false;
  private selection: Range | null = null;
  private undoStack: Snapshot[] = [];
  private redoStack: Snapshot[] = [];

  constructor(content: string[], readonly lineEnding: '\n' | '\r\n' = '\n') {
    this.content = content.length > 0 ? [...content] : [''];
  }

  getLines(): readonly string[] {
    return this.content;
  }

  setLines(lines: string[]): void {
    this.undoStack.push(this.snapshot());
    this.redoStack = [];
    this.content = lines.length > 0 ? [...lines] : [''];
    this.cursor = clampPosition(this.content, this.cursor);
    this.modified = true;
  }

  getCursor(): Position {
    return { ...this.cursor };
  }

  setCursor(position: Position): void {
    this.cursor = clampPosition(this.content, position);
  }

  isModified(): boolean {
    return this.modified;
  }

  markSaved(): void {
    this.modified = false;
  }

  getSelection(): Range | null {
    return this.selection;
  }

  setSelection(range: Range | null): void {
    this.selection = range;
  }

  undo(): void {
    const previous = this.undoStack.pop();
    if (!previous) {
      return;
    }
    this.redoStack.push(this.snapshot());
    this.restore(previous);
  }

  redo(): void {
    const next = this.redoStack.pop();
    if (!next) {
      return;
    }
    this.undoStack.push(this.snapshot());
    this.restore(next);
  }

  getText(): string {
    return this.content.join(this.lineEnding);
  }

  private snapshot(): Snapshot {
    return { lines: [...this.content], cursor: { ...this.cursor } };
  }

  private restore(snapshot: Snapshot): void {
    this.content = snapshot.lines;
    this.cursor = clampPosition(this.content, snapshot.cursor);
    this.modified = true;
  }
}

export function createBuffer(content: string | string[]): MemoryBuffer {
  if (Array.isArray(content)) {
    return new MemoryBuffer(content);
  }
  const lineEnding: '\n' | '\r\n' = content.includes('\r\n') ? '\r\n' : '\n';
  const lines = content.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return new MemoryBuffer(lines, lineEnding);
}
