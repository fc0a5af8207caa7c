import type { CommandLineKind } from "../types";
import type { VisualMode } from "../models/VimMode";
import type { MotionName } from "../operations/Motions";

export type OperatorName = 'delete' | 'change' | 'yank';

export type InsertVariant = 'before' | 'lineStart' | 'after' | 'lineEnd' | 'openBelow' | 'openAbove';

export type NormalCommand =
  | { type: 'motion'; motion: MotionName }
  | { type: 'operator'; operator: OperatorName; motion: MotionName | 'line' }
  | { type: 'deleteChar' }
  | { type: 'deleteCharBefore' }
  | { type: 'deleteToLineEnd' }
  | { type: 'changeToLineEnd' }
  | { type: 'paste'; before: boolean }
  | { type: 'replaceChar'; char: string }
  | { type: 'enterInsert'; variant: InsertVariant }
  | { type: 'enterVisual'; mode: VisualMode }
  | { type: 'enterReplace' }
  | { type: 'enterCommandLine'; kind: CommandLineKind }
  | { type: 'searchNext'; reverse: boolean }
  | { type: 'searchWord'; backward: boolean }
  | { type: 'setMark'; name: string }
  | { type: 'jumpToMark'; name: string; exact: boolean }
  | { type: 'startRecording'; register: string }
  | { type: 'stopRecording' }
  /** `@` as the register means "the last one played". */
  | { type: 'playMacro'; register: string }
  | { type: 'selectRegister'; register: string }
  | { type: 'undo' }
  | { type: 'redo' }
  | { type: 'repeat' };

export type ParseResult =
  | { status: 'complete'; command: NormalCommand }
  | { status: 'pending' }
  | { status: 'unknown' };

export interface ParseContext {
  recording: boolean;
}

export const MOTION_KEYS: Readonly<Record<string, MotionName>> = {
  h: 'left',
  Left: 'left',
  l: 'right',
  Right: 'right',
  k: 'up',
  Up: 'up',
  j: 'down',
  Down: 'down',
  w: 'wordForward',
  b: 'wordBackward',
  e: 'wordEnd',
  '0': 'lineStart',
  '^': 'firstNonBlank',
  $: 'lineEnd',
  G: 'lastLine',
  gg: 'firstLine',
  '%': 'matchingBracket',
  'Ctrl+d': 'halfPageDown',
  'Ctrl+u': 'halfPageUp',
  'Ctrl+f': 'pageDown',
  'Ctrl+b': 'pageUp',
};

const COMMAND_KEYS: Readonly<Record<string, NormalCommand>> = {
  x: { type: 'deleteChar' },
  X: { type: 'deleteCharBefore' },
  D: { type: 'deleteToLineEnd' },
  C: { type: 'changeToLineEnd' },
  Y: { type: 'operator', operator: 'yank', motion: 'line' },
  p: { type: 'paste', before: false },
  P: { type: 'paste', before: true },
  i: { type: 'enterInsert', variant: 'before' },
  I: { type: 'enterInsert', variant: 'lineStart' },
  a: { type: 'enterInsert', variant: 'after' },
  A: { type: 'enterInsert', variant: 'lineEnd' },
  o: { type: 'enterInsert', variant: 'openBelow' },
  O: { type: 'enterInsert', variant: 'openAbove' },
  v: { type: 'enterVisual', mode: 'visual' },
  V: { type: 'enterVisual', mode: 'visual-line' },
  'Ctrl+v': { type: 'enterVisual', mode: 'visual-block' },
  R: { type: 'enterReplace' },
  ':': { type: 'enterCommandLine', kind: ':' },
  '/': { type: 'enterCommandLine', kind: '/' },
  '?': { type: 'enterCommandLine', kind: '?' },
  n: { type: 'searchNext', reverse: false },
  N: { type: 'searchNext', reverse: true },
  '*': { type: 'searchWord', backward: false },
  '#': { type: 'searchWord', backward: true },
  u: { type: 'undo' },
  'Ctrl+r': { type: 'redo' },
  '.': { type: 'repeat' },
};

const OPERATOR_KEYS: Readonly<Record<string, OperatorName>> = {
  d: 'delete',
  c: 'change',
  y: 'yank',
};

/** Prefixes whose next key is taken literally (a character, mark or register name). */
const ARGUMENT_PREFIXES = new Set(['r', 'm', "'", '`', 'q', '@', '"']);

const MARK_NAME = /^[a-zA-Z]$/;
const REGISTER_NAME = /^[a-zA-Z0-9"]$/;
const MACRO_REGISTER = /^[a-zA-Z0-9]$/;

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function isOperatorPrefix(pending: string): boolean {
  return lookup(OPERATOR_KEYS, pending) !== undefined;
}

/** True while the next key is an argument, so a digit is not a count. */
export function expectsArgument(pending: string): boolean {
  return ARGUMENT_PREFIXES.has(pending);
}

export function parseNormalCommand(keys: string, context: ParseContext): ParseResult {
  if (keys === '') {
    return { status: 'pending' };
  }

  if (keys === 'q' && context.recording) {
    return complete({ type: 'stopRecording' });
  }

  const motion = lookup(MOTION_KEYS, keys);
  if (motion) {
    return complete({ type: 'motion', motion });
  }
  const command = lookup(COMMAND_KEYS, keys);
  if (command) {
    return complete(command);
  }

  if (keys === 'g' || ARGUMENT_PREFIXES.has(keys)) {
    return { status: 'pending' };
  }

  const prefix = keys[0];
  const rest = keys.substring(1);

  const operator = lookup(OPERATOR_KEYS, prefix);
  if (operator) {
    if (rest === '') {
      return { status: 'pending' };
    }
    if (rest === prefix) {
      return complete({ type: 'operator', operator, motion: 'line' });
    }
    if (rest === 'g') {
      return { status: 'pending' };
    }
    const target = lookup(MOTION_KEYS, rest);
    return target ? complete({ type: 'operator', operator, motion: target }) : { status: 'unknown' };
  }

  switch (prefix) {
    case 'r':
      return rest.length === 1 ? complete({ type: 'replaceChar', char: rest }) : { status: 'unknown' };
    case 'm':
      return MARK_NAME.test(rest) ? complete({ type: 'setMark', name: rest }) : { status: 'unknown' };
    case "'":
    case '`':
      return MARK_NAME.test(rest)
        ? complete({ type: 'jumpToMark', name: rest, exact: prefix === '`' })
        : { status: 'unknown' };
    case 'q':
      return MACRO_REGISTER.test(rest) ? complete({ type: 'startRecording', register: rest }) : { status: 'unknown' };
    case '@':
      return rest === '@' || MACRO_REGISTER.test(rest)
        ? complete({ type: 'playMacro', register: rest })
        : { status: 'unknown' };
    case '"':
      return REGISTER_NAME.test(rest) ? complete({ type: 'selectRegister', register: rest }) : { status: 'unknown' };
    default:
      return { status: 'unknown' };
  }
}

function complete(command: NormalCommand): ParseResult {
  return { status: 'complete', command };
}

export function isExCommand(cmd: string): boolean {
  return cmd.startsWith(':');
}

export function stripColonPrefix(cmd: string): string {
  return cmd.startsWith(':') ? cmd.substring(1) : cmd;
}
