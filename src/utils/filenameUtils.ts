/**
 * Filename helpers shared by the pipeline, the organizer and the tool layer
 */

import { NAMING, ORGANIZATION } from '../config/constants.js';

/**
 * First N whitespace-separated tokens longer than the minimum length
 */
export function meaningfulTokens(text: string | undefined, max: number = NAMING.MAX_TOKENS): string[] {
  if (!text) {
    return [];
  }
  return text
    .split(/\s+/)
    .filter(token => token.length > NAMING.MIN_TOKEN_LENGTH)
    .slice(0, max);
}

/**
 * Lower-cased, underscore-joined name from the leading tokens of some text,
 * or `{category}_screenshot` when no token qualifies
 */
export function nameFromText(text: string | undefined, category: string): string {
  const tokens = meaningfulTokens(text);
  if (tokens.length === 0) {
    return `${category}_screenshot`;
  }
  return tokens.join('_').toLowerCase();
}

/**
 * Reduce a free-form name to [a-z0-9_-], at most 50 characters
 */
export function sanitizeFilename(name: string): string {
  let safe = name.replace(/[^A-Za-z0-9_\s-]/g, '');
  safe = safe.replace(/[-\s]+/g, '_');
  safe = safe.replace(/^_+|_+$/g, '').toLowerCase();

  if (safe.length > ORGANIZATION.MAX_NAME_LENGTH) {
    safe = safe.slice(0, ORGANIZATION.MAX_NAME_LENGTH);
  }

  return safe || ORGANIZATION.FALLBACK_NAME;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD_HHMMSS in local time
 */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * YYYY-MM-DD in local time
 */
export function formatDate(date: Date = new Date()): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Extension with a leading dot ('' stays '')
 */
export function normalizeExtension(extension: string): string {
  if (!extension || extension.startsWith('.')) {
    return extension;
  }
  return `.${extension}`;
}
