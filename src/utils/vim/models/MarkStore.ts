import type { Position } from "../types";
import { positionsEqual } from "./Position";

/**
 * Jump history. `index` equals `entries.length` while the cursor is at a
 * live position that is not itself in the list.
 */
export class JumpList {
  private entries: Position[] = [];
  private index = 0;

  constructor(private readonly limit: number) {}

  get positions(): readonly Position[] {
    return this.entries;
  }

  get currentIndex(): number {
    return this.index;
  }

  push(position: Position): void {
    this.entries.push({ ...position });
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
    this.index = this.entries.length;
  }

  back(current: Position): Position | undefined {
    if (this.index === 0) {
      return undefined;
    }
    if (this.index === this.entries.length) {
      const last = this.entries[this.entries.length - 1];
      if (last && positionsEqual(last, current)) {
        this.index = this.entries.length - 1;
      } else {
        this.push(current);
        this.index = this.entries.length - 1;
      }
      if (this.index === 0) {
        return undefined;
      }
    }
    this.index--;
    return { ...this.entries[this.index] };
  }

  forward(): Position | undefined {
    if (this.index >= this.entries.length - 1) {
      return undefined;
    }
    this.index++;
    return { ...this.entries[this.index] };
  }

  clear(): void {
    this.entries = [];
    this.index = 0;
  }
}

export class MarkStore {
  private readonly marks = new Map<string, Position>();
  readonly jumps: JumpList;

  constructor(jumpListLimit: number) {
    this.jumps = new JumpList(jumpListLimit);
  }

  setMark(name: string, position: Position): void {
    this.marks.set(name, { ...position });
  }

  getMark(name: string): Position | undefined {
    const mark = this.marks.get(name);
    return mark ? { ...mark } : undefined;
  }

  pushJump(position: Position): void {
    this.jumps.push(position);
  }

  jumpBack(current: Position): Position | undefined {
    return this.jumps.back(current);
  }

  jumpForward(): Position | undefined {
    return this.jumps.forward();
  }

  /** Marks on removed lines are dropped, marks below them move up. */
  adjustForDeletedLines(start: number, count: number): void {
    const end = start + count - 1;
    for (const [name, mark] of this.marks) {
      if (mark.row >= start && mark.row <= end) {
        this.marks.delete(name);
      } else if (mark.row > end) {
        this.marks.set(name, { row: mark.row - count, column: mark.column });
      }
    }
  }

  /** Marks at or below `start` move down by `count` rows. */
  adjustForInsertedLines(start: number, count: number): void {
    for (const [name, mark] of this.marks) {
      if (mark.row >= start) {
        this.marks.set(name, { row: mark.row + count, column: mark.column });
      }
    }
  }

  formatMarks(lines: readonly string[]): string {
    const names = Array.from(this.marks.keys()).sort();
    if (names.length === 0) {
      return 'No marks set';
    }
    const rows = names.map((name) => {
      const mark = this.marks.get(name);
      const row = mark?.row ?? 0;
      const column = mark?.column ?? 0;
      const content = lines[row]?.substring(0, 50) ?? '';
      return ` ${name}  ${row + 1}  ${column}  ${content}`;
    });
    return 'mark line  col  text\n' + rows.join('\n');
  }
}
