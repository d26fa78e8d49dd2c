import { afterEach, describe, expect, it, vi } from 'vitest';
import { IrcColor, SpanFormat } from '../../types';
import { UrlPatternError } from '../errors';
import { IrcPalette } from '../ircPalette';
import { IrcTextFormat } from '../IrcTextFormat';
import { DEFAULT_URL_PATTERN } from '../linkParser';

describe('IrcTextFormat', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts with the default configuration', () => {
    const format = new IrcTextFormat();
    expect(format.spanFormat).toBe(SpanFormat.Style);
    expect(format.urlPattern).toBe(DEFAULT_URL_PATTERN);
    expect(format.palette.get(IrcColor.Green, 'black')).toBe('green');
  });

  it('reads the shared palette on every call', () => {
    const palette = new IrcPalette();
    const format = new IrcTextFormat({ palette });
    expect(format.palette).toBe(palette);

    palette.set(IrcColor.Red, '#ff3333');
    expect(format.toHtml('\x034x')).toBe("<span style='color: #ff3333'>x");
  });

  it('switches span format', () => {
    const format = new IrcTextFormat();
    format.spanFormat = SpanFormat.Class;
    expect(format.toHtml('\x02b\x02')).toBe("<span class='bold'>b</span>");
  });

  it('disables links with an empty pattern', () => {
    const format = new IrcTextFormat({ urlPattern: '' });
    expect(format.toHtml('http://example.com')).toBe('http://example.com');
  });

  it('reports an invalid pattern and renders without links', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const onError = vi.fn();
    const format = new IrcTextFormat();
    format.on('error', onError);
    format.urlPattern = '(';

    expect(format.toHtml('\x02x\x02 http://example.com')).toBe(
      "<span style='font-weight: bold'>x</span> http://example.com"
    );
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBeInstanceOf(UrlPatternError);
    expect(onError.mock.calls[0][0].pattern).toBe('(');
    expect(consoleError).toHaveBeenCalledWith('[IrcTextFormat] Invalid URL pattern', expect.any(UrlPatternError));
  });

  it('stops notifying removed handlers', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const onError = vi.fn();
    const format = new IrcTextFormat({ urlPattern: '[' });
    format.on('error', onError);
    format.off('error', onError);

    expect(format.toHtml('a.b')).toBe('a.b');
    expect(onError).not.toHaveBeenCalled();
  });

  it('logs spans left open in debug mode', () => {
    const consoleDebug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const format = new IrcTextFormat({ debug: true });
    format.toHtml('\x02\x034x');
    expect(consoleDebug).toHaveBeenCalledWith('[IrcTextFormat] 2 span(s) left open');

    consoleDebug.mockClear();
    format.toHtml('\x02x\x02');
    expect(consoleDebug).not.toHaveBeenCalled();
  });

  it('strips formatting to plain text', () => {
    expect(new IrcTextFormat().toPlainText('\x02\x034,5hi\x0F there')).toBe('hi there');
  });
});
