// src/loader/canonical.ts
import { isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const SCHEME_RE = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;

export const FILE_PREFIX = 'file://';

/**
 * Normalize a caller-supplied key into a canonical source key.
 *
 * - `file:` URIs and absolute paths become `file://<absolute path>`
 * - keys with any other scheme are returned unchanged
 * - anything else is a filesystem path when `defaultScheme` is `'file'`,
 *   and an opaque key otherwise
 *
 * Single-letter schemes are treated as drive letters, not URI schemes.
 * Percent-escapes in `file:` URIs are decoded and a `localhost` host is
 * dropped. A `file:` URI naming any other host is kept as an opaque key,
 * which `filePathOf` does not map to a local path.
 */
export function canonicalKey(raw: string, defaultScheme?: 'file'): string {
  const scheme = SCHEME_RE.exec(raw)?.[1];

  if (scheme !== undefined && scheme.toLowerCase() === 'file') {
    const rest = raw.slice(scheme.length + 1);
    if (!rest.startsWith('//')) return FILE_PREFIX + resolve(decodePath(rest));
    try {
      return FILE_PREFIX + resolve(fileURLToPath(raw));
    } catch {
      // remote host
      return raw;
    }
  }

  if (scheme !== undefined && scheme.length > 1) return raw;

  if (isAbsolute(raw) || defaultScheme === 'file') {
    return FILE_PREFIX + resolve(raw);
  }

  return raw;
}

function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    return path;
  }
}

/** Strip the `file://` prefix from a canonical file key. */
export function filePathOf(sourceKey: string): string | null {
  if (!sourceKey.startsWith(FILE_PREFIX)) return null;
  const path = sourceKey.slice(FILE_PREFIX.length);
  return isAbsolute(path) ? path : null;
}
