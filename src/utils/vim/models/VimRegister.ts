// src/utils/vim/models/VimRegister.ts

export const UNNAMED_REGISTER = '"';
export const YANK_REGISTER = '0';

const LINE_TERMINATOR = '\n';
const DISPLAY_LIMIT = 50;

/** A capture ending in a line terminator was taken from whole lines. */
export function isLinewise(text: string): boolean {
  return text.endsWith(LINE_TERMINATOR);
}

export function toLinewiseText(lines: readonly string[]): string {
  return lines.join(LINE_TERMINATOR) + LINE_TERMINATOR;
}

export function isValidRegisterName(name: string): boolean {
  return name.length === 1;
}

/**
 * Named text slots. Reading a register that was never written yields an
 * empty string.
 */
export class RegisterStore {
  private readonly slots = new Map<string, string>();

  capture(name: string, text: string): void {
    if (!isValidRegisterName(name)) {
      return;
    }
    this.slots.set(name, text);
  }

  get(name: string): string {
    return this.slots.get(name) ?? '';
  }

  has(name: string): boolean {
    return this.get(name) !== '';
  }

  recordYank(name: string, text: string): void {
    this.capture(name, text);
    this.capture(UNNAMED_REGISTER, text);
    this.capture(YANK_REGISTER, text);
  }

  recordDelete(name: string, text: string): void {
    this.capture(name, text);
    this.capture(UNNAMED_REGISTER, text);
    if (isLinewise(text)) {
      this.shiftDeleteRegisters(text);
    }
  }

  private shiftDeleteRegisters(text: string): void {
    for (let i = 9; i > 1; i--) {
      const previous = this.slots.get(`${i - 1}`);
      if (previous) {
        this.slots.set(`${i}`, previous);
      }
    }
    this.slots.set('1', text);
  }

  formatRegisters(): string {
    const names = Array.from(this.slots.keys())
      .filter((name) => this.get(name) !== '')
      .sort((a, b) => {
        if (a === UNNAMED_REGISTER) return -1;
        if (b === UNNAMED_REGISTER) return 1;
        const aDigit = /^\d$/.test(a);
        const bDigit = /^\d$/.test(b);
        if (aDigit && !bDigit) return -1;
        if (!aDigit && bDigit) return 1;
        return a.localeCompare(b);
      });

    if (names.length === 0) {
      return 'No registers';
    }

    return names
      .map((name) => {
        let contentStr = this.get(name).replace(/\n/g, '^J');
        if (contentStr.length > DISPLAY_LIMIT) {
          contentStr = contentStr.substring(0, DISPLAY_LIMIT - 3) + '...';
        }
        return `"${name}   ${contentStr}`;
      })
      .join('\n');
  }
}
