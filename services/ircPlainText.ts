// A color marker takes its fg(,bg) digits with it; every other control code is a single byte.
const FORMATTING = /\x03(?:[0-9]{1,2}(?:,[0-9]{1,2})?)?|[\x02\x0F\x13\x15\x16\x1D\x1F]/g;

/**
 * Strips IRC formatting (colors, bold, underline etc.) from text.
 */
export function toPlainText(text: string): string {
  return text.replace(FORMATTING, '');
}
