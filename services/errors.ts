/**
 * Raised when a caller-supplied URL pattern is not a valid regular expression.
 */
export class UrlPatternError extends Error {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid URL pattern: ${reason}`, { cause });
    this.name = 'UrlPatternError';
    this.pattern = pattern;
  }
}
