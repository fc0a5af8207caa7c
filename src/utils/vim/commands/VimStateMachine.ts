// src/utils/vim/commands/VimStateMachine.ts
import type { CommandContext, CommandLineKind, EditTarget, Range, TextDocument, VimHost } from "../types";
import { createVimState, getModeLabel, isVisualMode } from "../models/VimMode";
import type { VimMode, VimState } from "../models/VimMode";
import { resolveOptions } from "../config";
import type { ResolvedVimOptions, VimOptions } from "../config";
import { toVimError } from "../errors";
import { UNNAMED_REGISTER } from "../models/VimRegister";
import { clampToCharacter } from "../models/Position";
import { deleteBackward, insertText, overwriteChar, selectionSpan, spanToRange, splitLine } from "../operations/TextOperations";
import { expectsArgument, isOperatorPrefix, parseNormalCommand } from "./CommandParser";
import type { NormalCommand, OperatorName } from "./CommandParser";
import { NormalCommandHandler, usesRegister } from "./NormalCommandHandler";
import { ExCommandHandler } from "./ExCommandHandler";

const KEY_ALIASES: Readonly<Record<string, string>> = {
  Space: ' ',
  Tab: '\t',
  Return: 'Enter',
  Esc: 'Escape',
  '\x1b': 'Escape',
  '\r': 'Enter',
  '\n': 'Enter',
  '\b': 'Backspace',
  '\x7f': 'Backspace',
};

const VISUAL_OPERATORS: Readonly<Record<string, OperatorName>> = {
  d: 'delete',
  x: 'delete',
  c: 'change',
  y: 'yank',
};

const MAX_COUNT = 99999;

export function normalizeKey(key: string): string {
  return Object.prototype.hasOwnProperty.call(KEY_ALIASES, key) ? KEY_ALIASES[key] : key;
}

/**
 * Entry point for key events. Owns the interpreter state, routes each key by
 * mode and commits the working copy of the document after every command.
 */
export class VimStateMachine {
  private static readonly LOG_PREFIX = "[VimStateMachine]";

  private readonly state: VimState;
  private readonly options: ResolvedVimOptions;
  private readonly normalHandler = new NormalCommandHandler();
  private readonly exHandler = new ExCommandHandler();
  /** Digits typed after an operator (`d3w`); multiplied with the leading count. */
  private motionCount = '';

  constructor(
    private document: TextDocument,
    private readonly host: VimHost,
    options: VimOptions = {}
  ) {
    this.options = resolveOptions(options);
    this.state = createVimState(this.options);
  }

  getState(): VimState {
    return this.state;
  }

  getMode(): VimMode {
    return this.state.mode;
  }

  getModeLabel(): string {
    return getModeLabel(this.state.mode);
  }

  getOptions(): ResolvedVimOptions {
    return this.options;
  }

  /** Registers, marks, macros and settings survive; mode and pending input do not. */
  setDocument(document: TextDocument): void {
    const previous = this.state.mode;
    this.document = document;
    this.resetPending();
    this.state.commandLine = null;
    this.state.visualAnchor = null;
    this.state.mode = 'normal';
    this.notifyModeChange(previous);
  }

  getSelection(): Range | null {
    const { mode, visualAnchor } = this.state;
    if (!isVisualMode(mode) || !visualAnchor) {
      return null;
    }
    const lines = this.document.getLines();
    return spanToRange(lines, selectionSpan(lines, mode, visualAnchor, this.document.getCursor()));
  }

  /** Returns true when the key was consumed. Errors are reported to the host, never thrown. */
  handleKey(key: string): boolean {
    try {
      return this.processKey(normalizeKey(key));
    } catch (e) {
      this.reportError(e);
      return true;
    }
  }

  /** Runs an ex command or search typed at a prompt opened by `:`, `/` or `?`. */
  submitCommandLine(text: string): void {
    if (this.state.macros.isRecording) {
      this.recordSubmittedText(text);
    }
    this.executeCommandLine(text);
  }

  /** Records prompt text the host supplied as the keys that would type it. */
  private recordSubmittedText(text: string): void {
    const { macros, commandLine } = this.state;
    if (!commandLine) {
      macros.observe(':');
    }
    const typed = commandLine?.text ?? '';
    const keys: string[] = [];
    if (text.startsWith(typed)) {
      keys.push(...text.slice(typed.length));
    } else {
      keys.push(...Array<string>(typed.length).fill('Backspace'), ...text);
    }
    keys.push('Enter');
    keys.forEach((key) => macros.observe(key));
  }

  private executeCommandLine(text: string): void {
    const kind: CommandLineKind = this.state.commandLine?.kind ?? ':';
    this.closeCommandLine();
    try {
      if (kind === ':') {
        this.runWithTarget((ctx) => this.exHandler.execute(text, ctx));
      } else {
        this.runSearch(text, kind === '/' ? 'forward' : 'backward');
      }
    } catch (e) {
      this.reportError(e);
    }
  }

  cancelCommandLine(): void {
    this.resetPending();
    this.closeCommandLine();
  }

  jumpBack(): void {
    const position = this.state.marks.jumpBack(this.document.getCursor());
    if (position) {
      this.document.setCursor(clampToCharacter(this.document.getLines(), position));
    }
  }

  jumpForward(): void {
    const position = this.state.marks.jumpForward();
    if (position) {
      this.document.setCursor(clampToCharacter(this.document.getLines(), position));
    }
  }

  private processKey(key: string): boolean {
    const macros = this.state.macros;
    if (macros.isRecording && !this.isStopRecordingKey(key)) {
      macros.observe(key);
    }

    this.debug(`key=${JSON.stringify(key)} mode=${this.state.mode} pending=${JSON.stringify(this.state.pendingCommand)}`);

    const consumed = this.dispatch(key);
    if (!consumed && macros.isPlaying) {
      this.host.forwardKey?.(key);
    }
    return consumed;
  }

  private dispatch(key: string): boolean {
    switch (this.state.mode) {
      case 'normal':
        return this.handleNormalKey(key);
      case 'insert':
        return this.handleInsertKey(key);
      case 'replace':
        return this.handleReplaceKey(key);
      case 'visual':
      case 'visual-line':
      case 'visual-block':
        return this.handleVisualKey(key);
      case 'command-line':
        return this.handleCommandLineKey(key);
    }
  }

  private handleNormalKey(key: string): boolean {
    if (key === 'Escape') {
      this.resetPending();
      return true;
    }
    if (this.acceptCountDigit(key)) {
      return true;
    }

    const keys = this.state.pendingCommand + key;
    const parsed = parseNormalCommand(keys, { recording: this.state.macros.isRecording });

    switch (parsed.status) {
      case 'pending':
        this.state.pendingCommand = keys;
        return true;
      case 'unknown':
        this.debug(`unrecognized sequence ${JSON.stringify(keys)}`);
        this.resetPending();
        return false;
      case 'complete': {
        const count = this.takeCount();
        this.runNormalCommand(parsed.command, count, keys);
        return true;
      }
    }
  }

  /** Count digits; `0` is a digit only once a count has been started. */
  private acceptCountDigit(key: string): boolean {
    if (!/^[0-9]$/.test(key)) {
      return false;
    }
    const pending = this.state.pendingCommand;
    if (expectsArgument(pending)) {
      return false;
    }
    if (isOperatorPrefix(pending)) {
      if (key === '0' && this.motionCount === '') {
        return false;
      }
      this.motionCount += key;
      return true;
    }
    if (pending === '' && (key !== '0' || this.state.count > 0)) {
      this.state.count = Math.min(MAX_COUNT, this.state.count * 10 + Number(key));
      return true;
    }
    return false;
  }

  private takeCount(): number {
    const leading = this.state.count;
    const motion = this.motionCount ? parseInt(this.motionCount, 10) : 0;
    this.state.pendingCommand = '';
    this.state.count = 0;
    this.motionCount = '';
    if (!leading && !motion) {
      return 0;
    }
    return Math.min(MAX_COUNT, (leading || 1) * (motion || 1));
  }

  private runNormalCommand(command: NormalCommand, count: number, keys: string): void {
    switch (command.type) {
      case 'repeat':
        this.repeatLastCommand(count);
        return;
      case 'playMacro':
        this.playMacro(command.register, count);
        break;
      case 'undo':
        for (let i = 0; i < Math.max(1, count); i++) {
          this.document.undo?.();
        }
        break;
      case 'redo':
        for (let i = 0; i < Math.max(1, count); i++) {
          this.document.redo?.();
        }
        break;
      case 'enterCommandLine':
        this.openCommandLine(command.kind);
        break;
      default:
        this.runWithTarget((ctx) => this.normalHandler.execute(command, count, ctx));
    }

    if (command.type !== 'selectRegister') {
      this.state.lastCommand = { command, keys };
    }
    if (usesRegister(command)) {
      this.state.activeRegister = UNNAMED_REGISTER;
    }
  }

  /** `.` re-runs the stored keys with the count typed before it, if any. */
  private repeatLastCommand(count: number): void {
    const last = this.state.lastCommand;
    if (!last) {
      return;
    }
    this.runNormalCommand(last.command, count, last.keys);
  }

  private playMacro(register: string, count: number): void {
    const name = register === '@' ? this.state.lastMacroRegister : register;
    if (!name) {
      return;
    }
    this.state.lastMacroRegister = name;
    for (let i = 0; i < Math.max(1, count); i++) {
      if (!this.state.macros.play(name, (key) => this.processKey(key))) {
        return;
      }
    }
  }

  private isStopRecordingKey(key: string): boolean {
    return key === 'q' && this.state.mode === 'normal' && this.state.pendingCommand === '';
  }

  private handleInsertKey(key: string): boolean {
    if (key === 'Escape') {
      this.leaveInsert();
      return true;
    }
    if (!this.options.applyInsertKeys) {
      return false;
    }

    const autoIndent = this.state.settings.autoindent;
    switch (key) {
      case 'Enter':
        this.runWithTarget((ctx) => {
          splitLine(ctx.target, autoIndent);
          ctx.state.marks.adjustForInsertedLines(ctx.target.cursor.row, 1);
        });
        return true;
      case 'Backspace':
        this.runWithTarget((ctx) => {
          const { row } = ctx.target.cursor;
          const before = ctx.target.lines.length;
          deleteBackward(ctx.target);
          if (ctx.target.lines.length < before) {
            ctx.state.marks.adjustForDeletedLines(row, 1);
          }
        });
        return true;
      case '\t':
        this.runWithTarget((ctx) => insertText(ctx.target, this.options.tabText));
        return true;
      default:
        if (key.length !== 1) {
          return false;
        }
        this.runWithTarget((ctx) => insertText(ctx.target, key));
        return true;
    }
  }

  private handleReplaceKey(key: string): boolean {
    if (key === 'Escape') {
      this.leaveInsert();
      return true;
    }
    if (key === 'Backspace') {
      this.runWithTarget((ctx) => {
        ctx.target.cursor = { ...ctx.target.cursor, column: Math.max(0, ctx.target.cursor.column - 1) };
      });
      return true;
    }
    if (key.length !== 1) {
      return false;
    }
    this.runWithTarget((ctx) => overwriteChar(ctx.target, key));
    return true;
  }

  /** Escape from Insert or Replace: back to Normal, one column left. */
  private leaveInsert(): void {
    this.resetPending();
    this.runWithTarget((ctx) => {
      ctx.target.cursor = { ...ctx.target.cursor, column: Math.max(0, ctx.target.cursor.column - 1) };
      ctx.state.mode = 'normal';
    });
  }

  private handleVisualKey(key: string): boolean {
    if (key === 'Escape') {
      this.resetPending();
      this.runWithTarget((ctx) => this.normalHandler.leaveVisual(ctx, 'normal'));
      return true;
    }

    const pending = this.state.pendingCommand;
    if (pending === '') {
      const operator = Object.prototype.hasOwnProperty.call(VISUAL_OPERATORS, key) ? VISUAL_OPERATORS[key] : undefined;
      if (operator) {
        this.state.count = 0;
        this.runWithTarget((ctx) => this.normalHandler.executeVisual(operator, ctx));
        this.state.activeRegister = UNNAMED_REGISTER;
        return true;
      }
      if (key === 'o') {
        this.runWithTarget((ctx) => this.normalHandler.swapVisualAnchor(ctx));
        return true;
      }
    }
    if (this.acceptCountDigit(key)) {
      return true;
    }

    const keys = pending + key;
    const parsed = parseNormalCommand(keys, { recording: false });
    if (parsed.status === 'pending' && (keys === 'g' || keys === '"')) {
      this.state.pendingCommand = keys;
      return true;
    }

    if (parsed.status === 'complete') {
      const command = parsed.command;
      if (command.type === 'motion' || command.type === 'enterVisual' || command.type === 'selectRegister') {
        const count = this.takeCount();
        this.runWithTarget((ctx) => this.normalHandler.execute(command, count, ctx));
        return true;
      }
    }

    this.resetPending();
    return false;
  }

  private handleCommandLineKey(key: string): boolean {
    const line = this.state.commandLine;
    if (!line) {
      this.closeCommandLine();
      return false;
    }

    switch (key) {
      case 'Escape':
        this.cancelCommandLine();
        return true;
      case 'Enter':
        this.executeCommandLine(line.text);
        return true;
      case 'Backspace':
        if (line.text === '') {
          this.cancelCommandLine();
        } else {
          line.text = line.text.slice(0, -1);
        }
        return true;
      default:
        if (key.length !== 1) {
          return false;
        }
        line.text += key;
        return true;
    }
  }

  private openCommandLine(kind: CommandLineKind): void {
    const previous = this.state.mode;
    this.state.commandLine = { kind, text: '' };
    this.state.mode = 'command-line';
    this.notifyModeChange(previous);
    this.host.requestInput?.(kind);
  }

  private closeCommandLine(): void {
    const previous = this.state.mode;
    this.state.commandLine = null;
    if (previous === 'command-line') {
      this.state.mode = 'normal';
      this.notifyModeChange(previous);
    }
  }

  /** `/` and `?` submissions; an empty pattern reuses the last one. */
  private runSearch(text: string, direction: 'forward' | 'backward'): void {
    const pattern = text || this.state.search.pattern;
    if (!pattern) {
      return;
    }
    this.state.search = { pattern, direction };
    this.runWithTarget((ctx) => this.normalHandler.execute({ type: 'searchNext', reverse: false }, 0, ctx));
  }

  /**
   * Runs `action` against a copy of the document's lines and cursor, then
   * writes back: the text only when it changed, the cursor always.
   */
  private runWithTarget(action: (ctx: CommandContext) => void): void {
    const previous = this.state.mode;
    const target: EditTarget = {
      lines: [...this.document.getLines()],
      cursor: this.document.getCursor(),
      changed: false,
    };
    const ctx: CommandContext = {
      state: this.state,
      options: this.options,
      document: this.document,
      host: this.host,
      target,
    };

    action(ctx);

    if (ctx.target.changed) {
      this.document.setLines(ctx.target.lines);
    }
    this.document.setCursor(ctx.target.cursor);
    this.updateSelection(ctx.target, previous);
    this.notifyModeChange(previous);
  }

  private updateSelection(target: EditTarget, previous: VimMode): void {
    const { mode, visualAnchor } = this.state;
    if (isVisualMode(mode) && visualAnchor) {
      this.document.setSelection?.(
        spanToRange(target.lines, selectionSpan(target.lines, mode, visualAnchor, target.cursor))
      );
    } else if (isVisualMode(previous)) {
      this.document.setSelection?.(null);
    }
  }

  private notifyModeChange(previous: VimMode): void {
    if (this.state.mode !== previous) {
      this.debug(`mode ${previous} -> ${this.state.mode}`);
      this.host.onModeChange?.(this.state.mode, previous);
    }
  }

  private resetPending(): void {
    this.state.pendingCommand = '';
    this.state.count = 0;
    this.state.activeRegister = UNNAMED_REGISTER;
    this.motionCount = '';
  }

  private reportError(e: unknown): void {
    const error = toVimError(e);
    console.warn(`${VimStateMachine.LOG_PREFIX} ${error.kind}: ${error.message}`);
    this.resetPending();
    this.host.showError(error);
  }

  private debug(message: string): void {
    if (this.options.debug) {
      console.log(`${VimStateMachine.LOG_PREFIX} ${message}`);
    }
  }
}
