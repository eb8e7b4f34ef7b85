import os from 'os';
import path from 'path';
import fs from 'fs-extra';

/**
 * Path argument normalization for the tool boundary
 *
 * Callers often paste paths copied from a shell (escaped spaces, `~`), and
 * macOS screenshot names put a narrow no-break space (U+202F) before AM/PM
 * that is easy to lose when the name is retyped.
 */

const NARROW_NBSP = '\u202F';

/**
 * Unescape shell-escaped spaces and expand a leading `~`
 */
export function normalizePathArgument(raw: string): string {
  const unescaped = raw.replace(/\\ /g, ' ');

  if (unescaped === '~') {
    return os.homedir();
  }
  if (unescaped.startsWith('~/')) {
    return path.join(os.homedir(), unescaped.slice(2));
  }
  return unescaped;
}

/**
 * Filename variants differing only in the space before AM/PM
 */
export function meridiemVariants(filePath: string): string[] {
  const dir = path.dirname(filePath);
  const name = path.basename(filePath);

  const withNarrow = name.replace(/ (AM|PM)/g, `${NARROW_NBSP}$1`);
  const withRegular = name.replace(new RegExp(`${NARROW_NBSP}(AM|PM)`, 'g'), ' $1');

  return [withNarrow, withRegular]
    .filter(variant => variant !== name)
    .map(variant => path.join(dir, variant));
}

/**
 * Normalize a path argument and return the first existing candidate,
 * or undefined when neither the path nor its AM/PM variants exist
 */
export async function resolveExistingPath(raw: string): Promise<string | undefined> {
  const normalized = normalizePathArgument(raw);
  if (await fs.pathExists(normalized)) {
    return normalized;
  }

  for (const candidate of meridiemVariants(normalized)) {
    if (await fs.pathExists(candidate)) {
      return candidate;
    }
  }

  return undefined;
}
