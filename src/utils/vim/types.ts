import type { VimError } from "./errors";
import type { VimMode, VimState } from "./models/VimMode";
import type { ResolvedVimOptions } from "./config";

export interface Position {
  row: number;
  column: number;
}

export interface Range {
  start: Position;
  end: Position;
}

export type SearchDirection = 'forward' | 'backward';

/** Prompt that owns the command line: ex command or a search. */
export type CommandLineKind = ':' | '/' | '?';

/**
 * Document collaborator. The interpreter only ever reads the lines and cursor,
 * replaces the whole text and moves the cursor; storage and history stay with
 * the implementation.
 */
export interface TextDocument {
  getLines(): readonly string[];
  setLines(lines: string[]): void;
  getCursor(): Position;
  setCursor(position: Position): void;
  isModified(): boolean;
  undo?(): void;
  redo?(): void;
  setSelection?(range: Range | null): void;
  /** Host-side bracket matcher; the built-in scanner is used when absent. */
  matchBracket?(position: Position): Position | null;
}

/**
 * Host application callbacks. All calls are fire-and-forget and made on the
 * thread that feeds `handleKey`; background work in the host (autosave,
 * file watchers) must hop back onto that thread before touching the
 * interpreter.
 */
export interface VimHost {
  requestSave(): void;
  requestLoad(path: string): void;
  requestClose(force: boolean): void;
  setOption(name: string, value: boolean): void;
  showError(error: VimError): void;
  /** A command-line prompt opened; answer with submitCommandLine/cancelCommandLine. */
  requestInput?(kind: CommandLineKind): void;
  showMessage?(message: string): void;
  /** Receives keys replayed by a macro that the interpreter did not consume. */
  forwardKey?(key: string): void;
  onModeChange?(mode: VimMode, previous: VimMode): void;
}

/**
 * Working copy of the document for one dispatched command. Engines mutate
 * it in place and set `changed`; the dispatcher commits it afterwards.
 */
export interface EditTarget {
  lines: string[];
  cursor: Position;
  changed: boolean;
}

/** Everything a handler needs to run one command. */
export interface CommandContext {
  state: VimState;
  options: ResolvedVimOptions;
  document: TextDocument;
  host: VimHost;
  target: EditTarget;
}
