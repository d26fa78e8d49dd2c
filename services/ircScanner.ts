import { IrcStyle, IrcToken } from '../types';

export const IRC_BOLD = '\x02';
export const IRC_COLOR = '\x03';
export const IRC_RESET = '\x0F';
export const IRC_LINE_THROUGH = '\x13';
export const IRC_UNDERLINE = '\x15';
export const IRC_UNDERLINE_ALT = '\x1F';
export const IRC_INVERSE = '\x16';
export const IRC_ITALIC = '\x1D';

const STYLE_CODES: Record<string, IrcStyle> = {
  [IRC_BOLD]: IrcStyle.Bold,
  [IRC_ITALIC]: IrcStyle.Italic,
  [IRC_LINE_THROUGH]: IrcStyle.LineThrough,
  [IRC_UNDERLINE]: IrcStyle.Underline,
  [IRC_UNDERLINE_ALT]: IrcStyle.Underline,
  [IRC_INVERSE]: IrcStyle.Inverse,
};

const CONTROL_CODES = /[\x02\x03\x0F\x13\x15\x16\x1D\x1F]/g;

// fg(,bg), anchored at the position set through lastIndex
const COLOR_DIGITS = /([0-9]{1,2})(?:,([0-9]{1,2}))?/y;

export interface ParsedColors {
  fg: number;
  bg?: number;
  length: number;
}

/**
 * Parses the digits following a color marker. Returns null when no digit
 * starts at `pos`.
 */
export function parseColors(text: string, pos: number): ParsedColors | null {
  COLOR_DIGITS.lastIndex = pos;
  const match = COLOR_DIGITS.exec(text);
  if (!match) {
    return null;
  }
  return {
    fg: parseInt(match[1], 10),
    bg: match[2] !== undefined ? parseInt(match[2], 10) : undefined,
    length: match[0].length,
  };
}

/**
 * Splits IRC text into literal runs and formatting tokens, left to right.
 */
export class IrcScanner implements Iterable<IrcToken> {
  private pos = 0;

  constructor(private readonly text: string) {}

  get position(): number {
    return this.pos;
  }

  next(): IrcToken | null {
    const start = this.pos;
    if (start >= this.text.length) {
      return null;
    }

    const c = this.text[start];
    const style = STYLE_CODES[c];
    if (style !== undefined) {
      this.pos = start + 1;
      return { kind: 'style', style, start, end: this.pos };
    }

    if (c === IRC_RESET) {
      this.pos = start + 1;
      return { kind: 'reset', start, end: this.pos };
    }

    if (c === IRC_COLOR) {
      const colors = parseColors(this.text, start + 1);
      if (!colors) {
        this.pos = start + 1;
        return { kind: 'colorReset', start, end: this.pos };
      }
      this.pos = start + 1 + colors.length;
      return { kind: 'color', fg: colors.fg, bg: colors.bg, start, end: this.pos };
    }

    CONTROL_CODES.lastIndex = start;
    const control = CONTROL_CODES.exec(this.text);
    this.pos = control ? control.index : this.text.length;
    return { kind: 'text', text: this.text.slice(start, this.pos), start, end: this.pos };
  }

  *[Symbol.iterator](): Generator<IrcToken, void, undefined> {
    let token: IrcToken | null;
    while ((token = this.next()) !== null) {
      yield token;
    }
  }
}

export function tokenize(text: string): Generator<IrcToken, void, undefined> {
  return new IrcScanner(text)[Symbol.iterator]();
}
