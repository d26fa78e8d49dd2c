export { IrcColor, IrcStyle, SpanFormat } from './types';
export type { FormatState, IrcMember, IrcMemberSource, IrcToken, TextFormatConfig } from './types';
export { UrlPatternError } from './services/errors';
export { renderHtml, toHtml } from './services/ircHtml';
export type { HtmlRender } from './services/ircHtml';
export { IrcPalette } from './services/ircPalette';
export { toPlainText } from './services/ircPlainText';
export { IrcScanner, parseColors, tokenize } from './services/ircScanner';
export type { ParsedColors } from './services/ircScanner';
export { IrcTextFormat } from './services/IrcTextFormat';
export { DEFAULT_URL_PATTERN, compileUrlPattern, generateLink, parseLinks, percentEncode } from './services/linkParser';
