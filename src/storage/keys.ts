import path from 'node:path';

/**
 * Normalize an object key prefix: no leading slash, no repeated
 * separators, exactly one trailing slash unless empty.
 */
export function normalizeKeyPrefix(prefix: string): string {
  const segments = prefix
    .trim()
    .split('/')
    .filter((segment) => segment.length > 0);
  return segments.length === 0 ? '' : `${segments.join('/')}/`;
}

export function buildObjectKey(prefix: string, localPath: string): string {
  return `${normalizeKeyPrefix(prefix)}${path.basename(localPath)}`;
}

export function toObjectUri(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}
