/**
 * Content Fingerprints for Policy Compiler
 *
 * Requirements and Assessment documents are identified by a hash of their
 * canonical content, so the same statement always yields the same id and a
 * changed Assessment yields a new version fingerprint.
 */

import { createHash } from 'crypto';

/**
 * Fingerprint format: {algorithm}:{hash}
 * Example: sha256:3f1c0e...
 */
export type Fingerprint = `${string}:${string}`;

const ALGORITHM = 'sha256';

/**
 * Canonicalize a value so key order never changes the hash
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return '{' + entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',') + '}';
  }

  return String(value);
}

/**
 * Compute a fingerprint for any serializable value
 *
 * @param truncateLength - hex characters to keep (default: full hash)
 */
export function computeFingerprint(content: unknown, truncateLength?: number): Fingerprint {
  const hash = createHash(ALGORITHM).update(canonicalize(content), 'utf8').digest('hex');
  return `${ALGORITHM}:${truncateLength ? hash.slice(0, truncateLength) : hash}`;
}

/**
 * Short hex id for a piece of content (no algorithm prefix)
 */
export function shortId(content: unknown, length = 12): string {
  return createHash(ALGORITHM).update(canonicalize(content), 'utf8').digest('hex').slice(0, length);
}
