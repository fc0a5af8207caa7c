// src/utils/vim/commands/ExCommandHandler.ts
import type { CommandContext } from "../types";
import type { SettingName } from "../models/VimMode";
import { VimError } from "../errors";
import { UNNAMED_REGISTER, isValidRegisterName } from "../models/VimRegister";
import { positionsEqual } from "../models/Position";
import { parseRange, splitRange } from "../utils/RangeParser";
import type { LineRange, RangeContext } from "../utils/RangeParser";
import { parseSubstituteCommand, substituteLines } from "../operations/Substitution";
import { deleteSpan, captureSpan } from "../operations/TextOperations";
import { firstNonBlankColumn } from "../utils/WordClassifier";
import { stripColonPrefix } from "./CommandParser";

type SetAction = { name: SettingName; value: boolean | 'toggle' | 'query' };

export class ExCommandHandler {
  private static readonly SETTING_ALIASES: Readonly<Record<string, SettingName>> = {
    number: 'number',
    nu: 'number',
    wrap: 'wrap',
    ignorecase: 'ignorecase',
    ic: 'ignorecase',
    autoindent: 'autoindent',
    ai: 'autoindent',
  };

  execute(input: string, ctx: CommandContext): void {
    const cmd = stripColonPrefix(input.trim()).trim();
    if (!cmd) {
      return;
    }

    const { range: rangeStr, rest } = splitRange(cmd);
    const range = rangeStr ? parseRange(rangeStr, this.rangeContext(ctx)) : null;

    if (rest.startsWith('s/')) {
      this.substitute(rest, range ?? this.currentLine(ctx), ctx);
      return;
    }

    if (range && rest === '') {
      this.goToLine(range.end, ctx);
      return;
    }

    const [cmdName, ...argParts] = rest.split(/\s+/);
    const args = argParts.join(' ');

    switch (cmdName) {
      case 'w':
      case 'write':
      case 'w!':
        ctx.host.requestSave();
        return;

      case 'q':
      case 'quit':
        if (ctx.document.isModified()) {
          throw new VimError('UnsavedCloseBlocked', 'No write since last change (use :q! to force quit)');
        }
        ctx.host.requestClose(false);
        return;

      case 'q!':
      case 'quit!':
        ctx.host.requestClose(true);
        return;

      case 'wq':
      case 'x':
      case 'xit':
        ctx.host.requestSave();
        ctx.host.requestClose(false);
        return;

      case 'e':
      case 'edit':
        if (!args) {
          throw new VimError('MissingArgument', 'No file name');
        }
        ctx.host.requestLoad(args);
        return;

      case 'set':
      case 'se':
        this.applySettings(argParts.filter((part) => part !== ''), ctx);
        return;

      case 'd':
      case 'delete':
        this.deleteLines(range ?? this.currentLine(ctx), this.registerArgument(args), ctx);
        return;

      case 'y':
      case 'yank':
        this.yankLines(range ?? this.currentLine(ctx), this.registerArgument(args), ctx);
        return;

      case 'reg':
      case 'registers':
      case 'di':
      case 'display':
        ctx.host.showMessage?.(ctx.state.registers.formatRegisters());
        return;

      case 'marks':
        ctx.host.showMessage?.(ctx.state.marks.formatMarks(ctx.target.lines));
        return;

      default:
        throw new VimError('UnrecognizedExCommand', `Not an editor command: ${cmd}`);
    }
  }

  private substitute(command: string, range: LineRange, ctx: CommandContext): void {
    const parsed = parseSubstituteCommand(command);

    if (parsed.pattern === '') {
      if (!ctx.state.search.pattern) {
        throw new VimError('InvalidSubstitutionSyntax', 'No previous regular expression');
      }
      parsed.pattern = ctx.state.search.pattern;
    } else {
      ctx.state.search.pattern = parsed.pattern;
    }
    parsed.ignoreCase = parsed.ignoreCase || ctx.state.settings.ignorecase;

    const result = substituteLines(ctx.target.lines, range.start, range.end, parsed);
    if (!result.replaced) {
      return;
    }

    ctx.target.lines = result.lines;
    ctx.target.changed = true;
    ctx.host.showMessage?.(
      `${result.count} substitution${result.count === 1 ? '' : 's'} on ${result.lineCount} line${result.lineCount === 1 ? '' : 's'}`
    );
  }

  private applySettings(tokens: string[], ctx: CommandContext): void {
    if (tokens.length === 0) {
      throw new VimError('MissingArgument', 'Argument required');
    }

    // Every name is checked before any setting changes.
    const actions = tokens.map((token) => {
      const action = this.parseSetToken(token);
      if (!action) {
        throw new VimError('UnknownSetOption', `Unknown option: ${token}`);
      }
      return action;
    });

    for (const { name, value } of actions) {
      const current = ctx.state.settings[name];
      if (value === 'query') {
        ctx.host.showMessage?.(current ? `  ${name}` : `no${name}`);
        continue;
      }
      const next = value === 'toggle' ? !current : value;
      ctx.state.settings[name] = next;
      ctx.host.setOption(name, next);
    }
  }

  private parseSetToken(token: string): SetAction | undefined {
    const direct = this.resolveSetting(token);
    if (direct) {
      return { name: direct, value: true };
    }
    if (token.endsWith('!') || token.endsWith('?')) {
      const name = this.resolveSetting(token.slice(0, -1));
      return name ? { name, value: token.endsWith('!') ? 'toggle' : 'query' } : undefined;
    }
    if (token.startsWith('inv')) {
      const name = this.resolveSetting(token.substring(3));
      return name ? { name, value: 'toggle' } : undefined;
    }
    if (token.startsWith('no')) {
      const name = this.resolveSetting(token.substring(2));
      return name ? { name, value: false } : undefined;
    }
    return undefined;
  }

  private resolveSetting(name: string): SettingName | undefined {
    const aliases = ExCommandHandler.SETTING_ALIASES;
    return Object.prototype.hasOwnProperty.call(aliases, name) ? aliases[name] : undefined;
  }

  private deleteLines(range: LineRange, register: string, ctx: CommandContext): void {
    const text = deleteSpan(ctx.target, { kind: 'lines', startRow: range.start, endRow: range.end });
    ctx.state.registers.recordDelete(register, text);
    ctx.state.marks.adjustForDeletedLines(range.start, range.end - range.start + 1);
  }

  private yankLines(range: LineRange, register: string, ctx: CommandContext): void {
    const text = captureSpan(ctx.target.lines, { kind: 'lines', startRow: range.start, endRow: range.end });
    ctx.state.registers.recordYank(register, text);
  }

  private registerArgument(args: string): string {
    if (!args) {
      return UNNAMED_REGISTER;
    }
    if (!isValidRegisterName(args)) {
      throw new VimError('CommandFailed', `Invalid register name: ${args}`);
    }
    return args;
  }

  private goToLine(row: number, ctx: CommandContext): void {
    const destination = { row, column: firstNonBlankColumn(ctx.target.lines[row] ?? '') };
    if (!positionsEqual(destination, ctx.target.cursor)) {
      ctx.state.marks.pushJump(ctx.target.cursor);
    }
    ctx.target.cursor = destination;
  }

  private currentLine(ctx: CommandContext): LineRange {
    return { start: ctx.target.cursor.row, end: ctx.target.cursor.row };
  }

  private rangeContext(ctx: CommandContext): RangeContext {
    return {
      lines: ctx.target.lines,
      currentRow: ctx.target.cursor.row,
      getMark: (name) => ctx.state.marks.getMark(name),
    };
  }
}
