/**
 * Port: SlugService
 *
 * Turns arbitrary text into filesystem-safe tokens.
 */
export interface SlugService {
  /** Lowercase slug: alphanumerics kept, every other run becomes one dash. */
  slugify(text: string): string;

  /** First 12 hex characters of the SHA-256 digest of `text`. */
  hashSource(text: string): string;
}
