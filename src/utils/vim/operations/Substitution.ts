import { VimError } from "../errors";

export interface SubstituteCommand {
  pattern: string;
  replacement: string;
  global: boolean;
  ignoreCase: boolean;
}

export interface SubstitutionResult {
  replaced: boolean;
  /** Occurrences replaced. */
  count: number;
  /** Rows that had at least one replacement. */
  lineCount: number;
  lines: string[];
}

/**
 * Parses `s/pattern/replacement/flags`. `\/` is a literal slash; every other
 * backslash sequence is left for the regex engine. Trailing parts may be
 * omitted (`s/foo` deletes the match).
 */
export function parseSubstituteCommand(input: string): SubstituteCommand {
  if (!input.startsWith('s/')) {
    throw new VimError('InvalidSubstitutionSyntax', `Invalid substitute command: ${input}`);
  }

  const parts: string[] = [''];
  const body = input.substring(2);
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === '\\' && i + 1 < body.length) {
      parts[parts.length - 1] += body[i + 1] === '/' ? '/' : ch + body[i + 1];
      i++;
    } else if (ch === '/') {
      parts.push('');
    } else {
      parts[parts.length - 1] += ch;
    }
  }

  if (parts.length > 3) {
    throw new VimError('InvalidSubstitutionSyntax', `Trailing characters: ${input}`);
  }

  const [pattern, replacement = '', flags = ''] = parts;
  if (!/^[gi]*$/.test(flags)) {
    throw new VimError('InvalidSubstitutionSyntax', `Invalid flags: ${flags}`);
  }

  return {
    pattern,
    replacement: translateReplacement(replacement),
    global: flags.includes('g'),
    ignoreCase: flags.includes('i'),
  };
}

/** `\1`..`\9` become `$1`..`$9`; `\\` stays a single backslash. */
function translateReplacement(replacement: string): string {
  return replacement.replace(/\\([1-9\\])/g, (_match, ref: string) => (ref === '\\' ? '\\' : `$${ref}`));
}

export function compilePattern(pattern: string, global: boolean, ignoreCase: boolean): RegExp {
  try {
    return new RegExp(pattern, (global ? 'g' : '') + (ignoreCase ? 'i' : ''));
  } catch (e) {
    throw new VimError('InvalidSubstitutionSyntax', `Invalid pattern: ${pattern}`, { cause: e });
  }
}

/** Applies the command to rows `startRow..endRow`; the input array is not modified. */
export function substituteLines(
  lines: readonly string[],
  startRow: number,
  endRow: number,
  command: SubstituteCommand
): SubstitutionResult {
  const regex = compilePattern(command.pattern, command.global, command.ignoreCase);
  const counter = compilePattern(command.pattern, true, command.ignoreCase);
  const result = [...lines];
  let count = 0;
  let lineCount = 0;

  for (let row = Math.max(0, startRow); row <= endRow && row < result.length; row++) {
    const line = result[row];
    const matches = command.global ? Array.from(line.matchAll(counter)).length : regex.test(line) ? 1 : 0;
    if (matches === 0) {
      continue;
    }
    result[row] = line.replace(regex, command.replacement);
    count += matches;
    lineCount++;
  }

  return { replaced: count > 0, count, lineCount, lines: result };
}
