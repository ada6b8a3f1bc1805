import path from 'node:path';

/**
 * Converts an OS-specific path to a normalized S3 key.
 * - Replaces backslashes with forward slashes.
 * - Removes leading slashes.
 * - Collapses multiple slashes into one.
 */
export function toS3Path(osPath: string): string {
  return osPath
    .replace(new RegExp(`\\${path.sep}`, 'g'), '/') // OS separators to /
    .replace(/\\/g, '/') // Force backslashes to / (Windows fallback)
    .replace(/\/+/g, '/') // Collapse multiple // to /
    .replace(/^\//, ''); // Remove leading /
}

/**
 * Normalizes the destination prefix of a job.
 * - null/undefined becomes an empty prefix.
 * - Surrounding whitespace is trimmed.
 * - Exactly one leading slash is removed.
 * - A trailing slash is added to a non-empty prefix that lacks one.
 */
export function normalizeDestinationPrefix(raw?: string | null): string {
  if (raw === null || raw === undefined) {
    return '';
  }

  let prefix = raw.trim();
  if (prefix.startsWith('/')) {
    prefix = prefix.substring(1);
  }
  if (prefix.length > 0 && !prefix.endsWith('/')) {
    prefix = `${prefix}/`;
  }
  return prefix;
}

/**
 * Builds the object key for a file relative to its selection's base directory.
 */
export function buildObjectKey(prefix: string, relativePath: string): string {
  return `${prefix}${toS3Path(relativePath)}`;
}
