import type { Position } from "../types";
import { VimError } from "../errors";

/** Zero-based rows, both ends inclusive. */
export interface LineRange {
  start: number;
  end: number;
}

export interface RangeContext {
  lines: readonly string[];
  currentRow: number;
  getMark(name: string): Position | undefined;
}

const ADDRESS = String.raw`(?:\d+|[.$]|'[a-zA-Z]|\/(?:\\.|[^/\\])*\/)?(?:[+-]\d*)*`;
const RANGE_PREFIX = new RegExp(`^(?:%|${ADDRESS}(?:,${ADDRESS})?)`);
const SINGLE_ADDRESS = new RegExp(`^${ADDRESS}`);

/** Splits `10,20d` into `{ range: '10,20', rest: 'd' }`. */
export function splitRange(command: string): { range: string; rest: string } {
  const match = command.match(RANGE_PREFIX);
  const range = match ? match[0] : '';
  return { range, rest: command.substring(range.length).trim() };
}

export function parseRange(rangeStr: string, ctx: RangeContext): LineRange {
  const last = Math.max(0, ctx.lines.length - 1);

  if (rangeStr === '%') {
    return { start: 0, end: last };
  }

  const first = rangeStr.match(SINGLE_ADDRESS)?.[0] ?? '';
  const remainder = rangeStr.substring(first.length);
  if (!remainder.startsWith(',')) {
    const line = parseLineRef(first, ctx);
    return { start: line, end: line };
  }

  const start = parseLineRef(first, ctx);
  const end = parseLineRef(remainder.substring(1), ctx);

  if (end < start) {
    throw new VimError('CommandFailed', `Backwards range given: ${rangeStr}`);
  }

  return { start, end };
}

function parseLineRef(ref: string, ctx: RangeContext): number {
  const last = Math.max(0, ctx.lines.length - 1);
  let base = ctx.currentRow;
  let rest = ref;

  const number = rest.match(/^\d+/);
  if (number) {
    base = parseInt(number[0], 10) - 1;
    rest = rest.substring(number[0].length);
  } else if (rest.startsWith('.')) {
    rest = rest.substring(1);
  } else if (rest.startsWith('$')) {
    base = last;
    rest = rest.substring(1);
  } else if (rest.startsWith("'")) {
    const mark = rest[1];
    const position = ctx.getMark(mark);
    if (position === undefined) {
      throw new VimError('CommandFailed', `Mark '${mark} not set`);
    }
    base = position.row;
    rest = rest.substring(2);
  } else if (rest.startsWith('/')) {
    const search = rest.match(/^\/((?:\\.|[^/\\])*)\//);
    if (search) {
      base = findPatternRow(search[1], ctx);
      rest = rest.substring(search[0].length);
    }
  }

  for (const offset of rest.match(/[+-]\d*/g) ?? []) {
    const amount = offset.length > 1 ? parseInt(offset.substring(1), 10) : 1;
    base += offset[0] === '+' ? amount : -amount;
  }

  return Math.min(Math.max(0, base), last);
}

function findPatternRow(pattern: string, ctx: RangeContext): number {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (e) {
    throw new VimError('CommandFailed', `Invalid pattern: ${pattern}`, { cause: e });
  }

  for (let i = ctx.currentRow + 1; i < ctx.lines.length; i++) {
    if (regex.test(ctx.lines[i])) {
      return i;
    }
  }
  for (let i = 0; i <= ctx.currentRow && i < ctx.lines.length; i++) {
    if (regex.test(ctx.lines[i])) {
      return i;
    }
  }
  throw new VimError('CommandFailed', `Pattern not found: ${pattern}`);
}
