import { isAbsolute, normalize, relative, resolve, sep } from 'path';

// Control characters, zero-width and bidi marks, BOM
const UNSAFE_PATH_CHARS = /[\u0000-\u001F\u007F-\u009F\u200B-\u200F\u2028-\u202F\uFEFF]/g;

function cleanPath(input: string): string {
  return input.replace(UNSAFE_PATH_CHARS, '').replace(/%00/gi, '').trim();
}

/**
 * Resolve a path an agent asked to write, relative to `baseDir`.
 * Returns null for absolute paths, for the base itself and for anything
 * that lands outside it.
 */
export function resolveInside(baseDir: string, relativePath: string): string | null {
  const cleaned = cleanPath(relativePath);
  if (!cleaned || isAbsolute(cleaned)) {
    return null;
  }

  const base = resolve(baseDir);
  const target = resolve(base, normalize(cleaned));
  const rel = relative(base, target);

  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }
  return target;
}

/** Cap tool input size before tokenizing it */
export function limitLength(input: string, maxLength: number): string {
  return input.length <= maxLength ? input : `${input.slice(0, maxLength)}... [truncated]`;
}

export const LIMITS = {
  TEXT_MAX_LENGTH: 2_000_000,
} as const;
