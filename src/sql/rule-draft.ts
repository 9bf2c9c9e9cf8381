/**
 * Rule drafts: a synthesized query packaged for human review before it is
 * attached to a leaf control as a rule.
 */

import { ErrorCode, PolicyCompilerError } from '../core/errors.js';
import { computeFingerprint } from '../core/identity/fingerprint.js';
import type { Fingerprint } from '../core/identity/fingerprint.js';
import type { SqlArtifact } from './types.js';

export interface SqlRuleDraft {
  readonly id: Fingerprint;
  /** Name of the evidence the rule will produce */
  readonly evidenceName: string;
  readonly sqlQuery: string;
  readonly referencedEvidenceNames: readonly string[];
  readonly kind: SqlArtifact['kind'];
}

const EVIDENCE_NAME_RE = /^[A-Za-z][A-Za-z0-9_]*$/;

export function createSqlRuleDraft(artifact: SqlArtifact, newEvidenceName: string): SqlRuleDraft {
  const evidenceName = newEvidenceName.trim();
  if (evidenceName.length === 0) {
    throw new PolicyCompilerError(ErrorCode.INVALID_INPUT, 'New evidence name is required');
  }
  if (!EVIDENCE_NAME_RE.test(evidenceName)) {
    throw new PolicyCompilerError(
      ErrorCode.INVALID_INPUT,
      `Evidence name '${evidenceName}' must start with a letter and contain only letters, digits and underscores`
    );
  }
  if (artifact.tables.some((table) => table.toLowerCase() === evidenceName.toLowerCase())) {
    throw new PolicyCompilerError(
      ErrorCode.INVALID_INPUT,
      `Evidence name '${evidenceName}' collides with a table the query reads`,
      { tables: artifact.tables }
    );
  }

  return {
    id: computeFingerprint({ evidenceName, sql: artifact.sql }, 16),
    evidenceName,
    sqlQuery: artifact.sql,
    referencedEvidenceNames: [...artifact.tables],
    kind: artifact.kind,
  };
}
