// src/utils/vim/models/VimMode.ts
import type { CommandLineKind, Position, SearchDirection } from "../types";
import type { ResolvedVimOptions } from "../config";
import type { NormalCommand } from "../commands/CommandParser";
import { RegisterStore, UNNAMED_REGISTER } from "./VimRegister";
import { MarkStore } from "./MarkStore";
import { MacroRecorder } from "./MacroRecorder";

export type VimMode =
  | 'normal'
  | 'insert'
  | 'visual'
  | 'visual-line'
  | 'visual-block'
  | 'command-line'
  | 'replace';

export type VisualMode = Extract<VimMode, 'visual' | 'visual-line' | 'visual-block'>;

export type SettingName = 'number' | 'wrap' | 'ignorecase' | 'autoindent';

/** Count digits are not part of it; `.` takes the count typed before it. */
export interface LastCommand {
  command: NormalCommand;
  keys: string;
}

export interface VimState {
  mode: VimMode;
  pendingCommand: string;
  count: number;
  activeRegister: string;
  visualAnchor: Position | null;
  commandLine: { kind: CommandLineKind; text: string } | null;
  lastCommand?: LastCommand;
  search: { pattern: string; direction: SearchDirection };
  lastMacroRegister?: string;
  settings: Record<SettingName, boolean>;
  registers: RegisterStore;
  marks: MarkStore;
  macros: MacroRecorder;
}

export function createVimState(options: ResolvedVimOptions): VimState {
  return {
    mode: 'normal',
    pendingCommand: '',
    count: 0,
    activeRegister: UNNAMED_REGISTER,
    visualAnchor: null,
    commandLine: null,
    search: { pattern: '', direction: 'forward' },
    settings: {
      number: options.showLineNumbers,
      wrap: options.wordWrap,
      ignorecase: options.ignoreCase,
      autoindent: options.autoIndent,
    },
    registers: new RegisterStore(),
    marks: new MarkStore(options.jumpListLimit),
    macros: new MacroRecorder(options.maxMacroDepth),
  };
}

export function isVisualMode(mode: VimMode): mode is VisualMode {
  return mode === 'visual' || mode === 'visual-line' || mode === 'visual-block';
}

export function getModeLabel(mode: VimMode): string {
  switch (mode) {
    case 'normal':
      return 'NORMAL';
    case 'insert':
      return 'INSERT';
    case 'visual':
      return 'VISUAL';
    case 'visual-line':
      return 'V-LINE';
    case 'visual-block':
      return 'V-BLOCK';
    case 'command-line':
      return 'COMMAND';
    case 'replace':
      return 'REPLACE';
  }
}
