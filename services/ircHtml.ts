import { FormatState, IrcStyle, IrcToken, SpanFormat } from '../types';
import { IrcPalette } from './ircPalette';
import { IrcScanner } from './ircScanner';
import { compileUrlPattern, DEFAULT_URL_PATTERN, parseLinks } from './linkParser';

const SPAN_STYLES: Record<IrcStyle, string> = {
  [IrcStyle.Bold]: 'font-weight: bold',
  [IrcStyle.Italic]: 'font-style: italic',
  [IrcStyle.LineThrough]: 'text-decoration: line-through',
  [IrcStyle.Underline]: 'text-decoration: underline',
  [IrcStyle.Inverse]: 'text-decoration: inverse',
};

const CLOSE_SPAN = '</span>';

export interface HtmlRender {
  html: string;
  depth: number; // Spans still open at end of input
}

function isSpace(c: string | undefined): boolean {
  return c !== undefined && /\s/.test(c);
}

function openStyle(style: IrcStyle, spanFormat: SpanFormat): string {
  return spanFormat === SpanFormat.Style
    ? `<span style='${SPAN_STYLES[style]}'>`
    : `<span class='${style}'>`;
}

function openColor(fg: number, bg: number | undefined, palette: IrcPalette, spanFormat: SpanFormat): string {
  const fgName = palette.get(fg, 'black');
  const bgName = bg !== undefined ? palette.get(bg, 'transparent') : null;

  if (spanFormat === SpanFormat.Style) {
    const styles = [`color: ${fgName}`];
    if (bgName !== null) styles.push(`background-color: ${bgName}`);
    return `<span style='${styles.join('; ')}'>`;
  }

  const classes = [fgName];
  if (bgName !== null) classes.push(`${bgName}-background`);
  return `<span class='${classes.join(' ')}'>`;
}

/**
 * Converts IRC-formatted text to HTML span elements and reports how many
 * spans were left open. Throws UrlPatternError if `urlPattern` does not compile.
 */
export function renderHtml(
  text: string,
  palette: IrcPalette,
  spanFormat: SpanFormat = SpanFormat.Style,
  urlPattern: string = DEFAULT_URL_PATTERN
): HtmlRender {
  const links = urlPattern ? compileUrlPattern(urlPattern) : null;

  // Only '<' is escaped; other HTML metacharacters pass through unchanged.
  const source = text.replace(/</g, '&lt;');

  const state: FormatState = { styles: new Set(), fg: null, bg: null };
  let depth = 0;
  let html = '';
  let potentialUrl = false;

  const closeSpan = () => {
    if (depth > 0) {
      depth--;
      html += CLOSE_SPAN;
    }
  };

  const scanner = new IrcScanner(source);
  let token: IrcToken | null;
  while ((token = scanner.next()) !== null) {
    switch (token.kind) {
      case 'text':
        for (let i = token.start; !potentialUrl && i < token.end; i++) {
          const c = source[i];
          if (c !== '.' && c !== '/' && c !== ':') continue;
          // A dot, slash or colon NOT surrounded by a space indicates a potential URL
          const prev = i > token.start ? source[i - 1] : html[html.length - 1];
          const next = source[i + 1];
          if (prev !== undefined && next !== undefined && !isSpace(prev) && !isSpace(next)) {
            potentialUrl = true;
          }
        }
        html += token.text;
        break;

      case 'style':
        if (state.styles.has(token.style)) {
          state.styles.delete(token.style);
          closeSpan();
        } else {
          state.styles.add(token.style);
          depth++;
          html += openStyle(token.style, spanFormat);
        }
        break;

      case 'color':
        // Colors stack rather than toggle
        state.fg = token.fg;
        state.bg = token.bg ?? null;
        depth++;
        html += openColor(token.fg, token.bg, palette, spanFormat);
        break;

      case 'colorReset':
        state.fg = null;
        state.bg = null;
        closeSpan();
        break;

      case 'reset':
        html += CLOSE_SPAN.repeat(depth);
        state.styles.clear();
        state.fg = null;
        state.bg = null;
        depth = 0;
        break;
    }
  }

  if (potentialUrl && links) {
    html = parseLinks(html, links);
  }

  return { html, depth };
}

/**
 * Converts IRC-formatted text to HTML. Spans left open at the end of the
 * text are not closed.
 */
export function toHtml(
  text: string,
  palette: IrcPalette,
  spanFormat: SpanFormat = SpanFormat.Style,
  urlPattern: string = DEFAULT_URL_PATTERN
): string {
  return renderHtml(text, palette, spanFormat, urlPattern).html;
}
