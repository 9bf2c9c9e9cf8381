/**
 * SQL synthesis types for Policy Compiler
 */

import type { SqlSynthesisError } from '../core/errors.js';
import type { ResolvedEvidence } from '../graph/types.js';

export type ScalarFilterValue = string | number | boolean;

/**
 * null renders as IS NULL, an array as IN (...)
 */
export type FilterValue = ScalarFilterValue | null | readonly ScalarFilterValue[];

/**
 * Field name to required value; entries are ANDed
 */
export type Filters = Readonly<Record<string, FilterValue>>;

export const ComplianceOperator = {
  EQ: 'eq',
  NEQ: 'neq',
  GT: 'gt',
  GTE: 'gte',
  LT: 'lt',
  LTE: 'lte',
  IN: 'in',
  IS_NULL: 'is_null',
  NOT_NULL: 'not_null',
} as const;

export type ComplianceOperatorValue = (typeof ComplianceOperator)[keyof typeof ComplianceOperator];

/**
 * Condition a row must satisfy to count as compliant
 */
export interface ComplianceCheck {
  readonly field: string;
  readonly operator: ComplianceOperatorValue;
  readonly value?: FilterValue;
}

export interface ControlContext {
  /** Field that identifies the entity being assessed; summary rows group by it */
  readonly scopeKey?: string;
  readonly filters?: Filters;
  readonly complianceCheck?: ComplianceCheck;
}

export interface AssessmentContext {
  readonly filters?: Filters;
}

export const PlanKind = {
  SINGLE: 'SINGLE',
  UNION: 'UNION',
  JOIN: 'JOIN',
  NONE: 'NONE',
} as const;

export type PlanKindValue = (typeof PlanKind)[keyof typeof PlanKind];

export type QueryPlan =
  | { readonly kind: 'SINGLE'; readonly sources: readonly [ResolvedEvidence] }
  | {
      readonly kind: 'UNION';
      readonly sources: readonly ResolvedEvidence[];
      /** Shared column names in the first schema's order */
      readonly columns: readonly string[];
    }
  | {
      readonly kind: 'JOIN';
      readonly sources: readonly ResolvedEvidence[];
      readonly joinKey: string;
    }
  | {
      readonly kind: 'NONE';
      readonly sources: readonly ResolvedEvidence[];
      readonly reason: 'no_shared_key';
    };

export type SqlArtifactKind = 'selection' | 'summary';

export interface SqlArtifact {
  readonly kind: SqlArtifactKind;
  readonly sql: string;
  /** Evidence table names the query reads */
  readonly tables: readonly string[];
  /** Every field the query references */
  readonly fields: readonly string[];
}

export type SynthesisOutcome =
  | { readonly ok: true; readonly artifact: SqlArtifact }
  | { readonly ok: false; readonly error: SqlSynthesisError };

export interface SynthesisResult {
  readonly plan: PlanKindValue;
  readonly selection: SynthesisOutcome;
  readonly summary: SynthesisOutcome;
}

export interface SynthesisOptions {
  /** Restrict the selection to these columns (default: every schema field) */
  readonly columns?: readonly string[];
}
