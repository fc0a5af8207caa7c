// src/utils/vim/index.ts
export { VimStateMachine, normalizeKey } from "./commands/VimStateMachine";
export { NormalCommandHandler, usesRegister } from "./commands/NormalCommandHandler";
export { ExCommandHandler } from "./commands/ExCommandHandler";
export { parseNormalCommand, isExCommand, stripColonPrefix } from "./commands/CommandParser";
export type { NormalCommand, OperatorName, InsertVariant, ParseResult } from "./commands/CommandParser";
export { MemoryBuffer, createBuffer } from "./models/VimBuffer";
export { RegisterStore, UNNAMED_REGISTER, YANK_REGISTER, isLinewise } from "./models/VimRegister";
export { MarkStore, JumpList } from "./models/MarkStore";
export { MacroRecorder } from "./models/MacroRecorder";
export { createVimState, getModeLabel, isVisualMode } from "./models/VimMode";
export type { VimMode, VisualMode, VimState, SettingName, LastCommand } from "./models/VimMode";
export {
  comparePositions,
  positionsEqual,
  normalizeRange,
  clampPosition,
  clampToCharacter,
} from "./models/Position";
export { applyMotion } from "./operations/Motions";
export type { MotionName, MotionResult } from "./operations/Motions";
export { findNext, findPrevious, wordUnderCursor } from "./operations/SearchOperations";
export { parseSubstituteCommand, substituteLines } from "./operations/Substitution";
export type { SubstituteCommand, SubstitutionResult } from "./operations/Substitution";
export { isWordBoundary, isWordCharacter, indentLevel } from "./utils/WordClassifier";
export { VimError, isVimError } from "./errors";
export type { VimErrorKind } from "./errors";
export { DEFAULT_VIM_OPTIONS, resolveOptions } from "./config";
export type { VimOptions, ResolvedVimOptions } from "./config";
export type {
  Position,
  Range,
  TextDocument,
  VimHost,
  CommandLineKind,
  SearchDirection,
  EditTarget,
  CommandContext,
} from "./types";
