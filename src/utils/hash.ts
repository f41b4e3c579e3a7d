/**
 * Hashing utilities for run IDs
 */

import { createHash } from 'crypto';

export function hashObject(obj: unknown): string {
  // Sort keys for deterministic hashing
  const str = JSON.stringify(obj, (_key, value: unknown) => {
    if (value && typeof value === 'object' && !Array.isArray(value)) {
      return Object.fromEntries(
        Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return value;
  });
  return createHash('sha256').update(str).digest('hex');
}

export function hashString(str: string): string {
  return createHash('sha256').update(str).digest('hex');
}

export function shortHash(str: string, length: number = 8): string {
  return hashString(str).substring(0, length);
}

/**
 * Same input contents and settings give the same run ID.
 */
export function generateRunId(content_hashes: Record<string, string[]>, settings: unknown): string {
  const combined = JSON.stringify({ content_hashes: hashObject(content_hashes), settings });
  return shortHash(combined, 12);
}
