import { SpanFormat, TextFormatConfig } from '../types';
import { UrlPatternError } from './errors';
import { HtmlRender, renderHtml } from './ircHtml';
import { IrcPalette } from './ircPalette';
import { toPlainText } from './ircPlainText';
import { DEFAULT_URL_PATTERN } from './linkParser';

interface TextFormatEvents {
  error: UrlPatternError;
}

type EventHandler<K extends keyof TextFormatEvents> = (data: TextFormatEvents[K]) => void;

/**
 * Converts IRC-style formatted messages to HTML or plain text.
 *
 * ```ts
 * const format = new IrcTextFormat({ spanFormat: SpanFormat.Class });
 * format.palette.set(IrcColor.Red, '#ff3333');
 * const html = format.toHtml(message);
 * ```
 */
export class IrcTextFormat {
  private config: TextFormatConfig;
  private listeners: { [K in keyof TextFormatEvents]?: EventHandler<K>[] } = {};

  constructor(config: Partial<TextFormatConfig> = {}) {
    this.config = {
      palette: config.palette ?? new IrcPalette(),
      spanFormat: config.spanFormat ?? SpanFormat.Style,
      urlPattern: config.urlPattern ?? DEFAULT_URL_PATTERN,
      debug: config.debug ?? false,
    };
  }

  get palette(): IrcPalette {
    return this.config.palette;
  }

  get spanFormat(): SpanFormat {
    return this.config.spanFormat;
  }

  set spanFormat(format: SpanFormat) {
    this.config.spanFormat = format;
  }

  /** Empty string disables link detection. */
  get urlPattern(): string {
    return this.config.urlPattern;
  }

  set urlPattern(pattern: string) {
    this.config.urlPattern = pattern;
  }

  on<K extends keyof TextFormatEvents>(event: K, callback: EventHandler<K>) {
    const handlers: EventHandler<K>[] = this.listeners[event] ?? [];
    handlers.push(callback);
    const listeners: { [P in K]?: EventHandler<P>[] } = this.listeners;
    listeners[event] = handlers;
  }

  off<K extends keyof TextFormatEvents>(event: K, callback: EventHandler<K>) {
    const handlers: EventHandler<K>[] | undefined = this.listeners[event];
    if (handlers) {
      const listeners: { [P in K]?: EventHandler<P>[] } = this.listeners;
      listeners[event] = handlers.filter((cb) => cb !== callback);
    }
  }

  private emit<K extends keyof TextFormatEvents>(event: K, data: TextFormatEvents[K]) {
    const handlers: EventHandler<K>[] | undefined = this.listeners[event];
    if (handlers) {
      handlers.forEach((cb) => cb(data));
    }
  }

  /**
   * Converts `text` to HTML and links any URLs found. An invalid URL pattern
   * is reported through the `error` event and the text is converted without links.
   */
  toHtml(text: string): string {
    const { palette, spanFormat, urlPattern } = this.config;
    let result: HtmlRender;
    try {
      result = renderHtml(text, palette, spanFormat, urlPattern);
    } catch (err) {
      if (!(err instanceof UrlPatternError)) throw err;
      console.error('[IrcTextFormat] Invalid URL pattern', err);
      this.emit('error', err);
      result = renderHtml(text, palette, spanFormat, '');
    }

    if (this.config.debug && result.depth > 0) {
      console.debug(`[IrcTextFormat] ${result.depth} span(s) left open`);
    }
    return result.html;
  }

  toPlainText(text: string): string {
    return toPlainText(text);
  }
}
