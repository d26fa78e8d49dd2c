import { UrlPatternError } from './errors';

// Characters a link may not end with, so sentence punctuation stays outside the anchor.
// Includes the guillemets and curly quotes «»“”‘’.
const TRAILING_EXCLUDED = "`!()\\[\\]{};:'\".,<>?«»“”‘’";

// Each repetition consumes a single character or one parenthesized group, so a
// failed match backtracks linearly.
const URL_LINK =
  '(?:(?:([a-z][\\w\\.-]+:/{1,3})|www|ftp\\d{0,3}[.]|[a-z0-9.\\-]+[.][a-z]{2,4}/)' +
  '(?:[^\\s()<>]|\\(([^\\s()<>]|(\\([^\\s()<>]+\\)))*\\))+' +
  '(?:\\(([^\\s()<>]|(\\([^\\s()<>]+\\)))*\\)|\\}\\]|[^\\s' + TRAILING_EXCLUDED + ']))';

const EMAIL_LINK = '[a-z0-9.\\-+_]+@[a-z0-9.\\-]+[.][a-z]{1,5}[^\\s/' + TRAILING_EXCLUDED + ']';

/**
 * Matches scheme-qualified URLs, bare `www.`/`ftp.`/`domain.tld/` URLs and
 * email addresses. Group 1 is the link, group 2 the scheme when present.
 */
export const DEFAULT_URL_PATTERN = `\\b(${URL_LINK}|${EMAIL_LINK})`;

// Left as-is in generated hrefs, on top of the unreserved characters.
const HREF_SAFE = ':/?@%#=+&,';
const UNRESERVED = /^[A-Za-z0-9\-._~]$/;

const encoder = new TextEncoder();

export function percentEncode(value: string): string {
  let encoded = '';
  for (const ch of value) {
    if (UNRESERVED.test(ch) || HREF_SAFE.includes(ch)) {
      encoded += ch;
      continue;
    }
    for (const byte of encoder.encode(ch)) {
      encoded += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
    }
  }
  return encoded;
}

export function compileUrlPattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'g');
  } catch (err) {
    throw new UrlPatternError(pattern, err);
  }
}

function schemeFor(match: RegExpExecArray): string {
  if (match[2]) {
    return '';
  }
  const link = match[0];
  if (link.includes('@')) {
    return 'mailto:';
  }
  if (link.toLowerCase().startsWith('ftp.')) {
    return 'ftp://';
  }
  return 'http://';
}

export function generateLink(scheme: string, href: string): string {
  return `<a href='${scheme}${percentEncode(href)}'>${href}</a>`;
}

/**
 * Replaces every link matched by `pattern` with an anchor. Matching runs
 * over the original string only, so generated markup is never re-scanned.
 */
export function parseLinks(html: string, pattern: RegExp): string {
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  const rx = new RegExp(pattern.source, flags);

  let result = '';
  let last = 0;
  let match: RegExpExecArray | null;
  while ((match = rx.exec(html)) !== null) {
    const href = match[0];
    if (!href) {
      rx.lastIndex++;
      continue;
    }
    result += html.slice(last, match.index) + generateLink(schemeFor(match), href);
    last = match.index + href.length;
  }
  return result + html.slice(last);
}
