export interface VimOptions {
  /** Insert-mode keys edit the document here instead of going back to the host widget. */
  applyInsertKeys?: boolean;
  /** Text inserted for Tab when `applyInsertKeys` is on. */
  tabText?: string;
  autoIndent?: boolean;
  ignoreCase?: boolean;
  showLineNumbers?: boolean;
  wordWrap?: boolean;
  /** Lines per page for Ctrl+f / Ctrl+b; half of it for Ctrl+d / Ctrl+u. */
  pageSize?: number;
  maxMacroDepth?: number;
  jumpListLimit?: number;
  debug?: boolean;
}

export type ResolvedVimOptions = Required<VimOptions>;

export const DEFAULT_VIM_OPTIONS: ResolvedVimOptions = {
  applyInsertKeys: false,
  tabText: '\t',
  autoIndent: false,
  ignoreCase: false,
  showLineNumbers: true,
  wordWrap: false,
  pageSize: 20,
  maxMacroDepth: 32,
  jumpListLimit: 100,
  debug: false,
};

export function resolveOptions(options: VimOptions = {}): ResolvedVimOptions {
  const d = DEFAULT_VIM_OPTIONS;
  return {
    applyInsertKeys: options.applyInsertKeys ?? d.applyInsertKeys,
    tabText: options.tabText ?? d.tabText,
    autoIndent: options.autoIndent ?? d.autoIndent,
    ignoreCase: options.ignoreCase ?? d.ignoreCase,
    showLineNumbers: options.showLineNumbers ?? d.showLineNumbers,
    wordWrap: options.wordWrap ?? d.wordWrap,
    pageSize: atLeastOne(options.pageSize ?? d.pageSize),
    maxMacroDepth: atLeastOne(options.maxMacroDepth ?? d.maxMacroDepth),
    jumpListLimit: atLeastOne(options.jumpListLimit ?? d.jumpListLimit),
    debug: options.debug ?? d.debug,
  };
}

function atLeastOne(value: number): number {
  return Number.isFinite(value) ? Math.max(1, Math.floor(value)) : 1;
}
