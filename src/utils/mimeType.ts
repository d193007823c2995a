import mime from 'mime-types';
import { minimatch } from 'minimatch';
import { DEFAULT_MIME_TYPE } from '../config/defaults.js';

/**
 * MIME type helpers
 *
 * Guessing is extension based (`mime-types`); matching uses glob patterns
 * such as `image/*` (`minimatch`).
 */

/**
 * Guess a MIME type from the file name, or null when unknown
 */
export function guessMimeType(filePath: string): string | null {
  return mime.lookup(filePath) || null;
}

/**
 * Top-level part of a MIME type (`image/png` → `image`)
 */
export function getMimeCategory(mimeType: string): string {
  const [category] = mimeType.split('/');
  return category ?? '';
}

/**
 * Kind of file derived from its extension (`photo.jpg` → `image`), or
 * `unknown` when the extension maps to no MIME type
 */
export function getFileKind(filePath: string): string {
  const mimeType = guessMimeType(filePath);
  if (mimeType === null) {
    return 'unknown';
  }
  return getMimeCategory(mimeType) || 'unknown';
}

/**
 * Whether a MIME type matches a glob pattern. The category form
 * (`<category>/*`) is tried as well, so a bare category such as `image`
 * still matches wildcard-subtype patterns.
 */
export function matchesMimePattern(mimeType: string, pattern: string): boolean {
  const normalized = mimeType.toLowerCase();
  const normalizedPattern = pattern.toLowerCase();

  return (
    minimatch(normalized, normalizedPattern) ||
    minimatch(`${getMimeCategory(normalized)}/*`, normalizedPattern)
  );
}

export function matchesAnyMimePattern(mimeType: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => matchesMimePattern(mimeType, pattern));
}

export { DEFAULT_MIME_TYPE };
