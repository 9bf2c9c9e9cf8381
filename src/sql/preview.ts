/**
 * Sample preview of a synthesized query.
 *
 * Queries are never executed here; an external SqlExecutor runs them. A
 * failed execution comes back as a value so callers can show it next to the
 * query text.
 */

import { formatError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import type { SqlArtifact } from './types.js';

export const MIN_SAMPLE_RECORDS = 1;
export const MAX_SAMPLE_RECORDS = 10;
export const DEFAULT_SAMPLE_RECORDS = 3;

export type SqlRow = Readonly<Record<string, unknown>>;

/**
 * Runs SQL against the evidence store
 */
export interface SqlExecutor {
  execute(sql: string, options: { readonly limit: number }): Promise<readonly SqlRow[]>;
}

export type PreviewResult =
  | {
      readonly ok: true;
      readonly kind: SqlArtifact['kind'];
      readonly sql: string;
      readonly records: number;
      readonly rows: readonly SqlRow[];
    }
  | {
      readonly ok: false;
      readonly kind: SqlArtifact['kind'];
      readonly sql: string;
      readonly records: number;
      readonly error: string;
    };

/**
 * Clamp a requested sample size; anything outside 1-10 falls back to 3
 */
export function normalizeSampleRecords(records: number | undefined): number {
  if (
    records === undefined ||
    !Number.isInteger(records) ||
    records < MIN_SAMPLE_RECORDS ||
    records > MAX_SAMPLE_RECORDS
  ) {
    return DEFAULT_SAMPLE_RECORDS;
  }
  return records;
}

/**
 * Run a query for a handful of sample rows
 */
export async function previewArtifact(
  executor: SqlExecutor,
  artifact: SqlArtifact,
  records?: number,
  logger: Logger = silentLogger
): Promise<PreviewResult> {
  const limit = normalizeSampleRecords(records);
  try {
    const rows = await executor.execute(artifact.sql, { limit });
    return { ok: true, kind: artifact.kind, sql: artifact.sql, records: limit, rows: rows.slice(0, limit) };
  } catch (err) {
    const error = formatError(err);
    logger.warn('sample query failed', { kind: artifact.kind, error });
    return { ok: false, kind: artifact.kind, sql: artifact.sql, records: limit, error };
  }
}
