/**
 * Predicate builder shared by the selection and summary queries.
 *
 * Both queries take their WHERE clause from `buildFilterPredicates`, so the
 * summary always counts exactly the rows the selection returns.
 */

import { ErrorCode, SqlSynthesisError } from '../core/errors.js';
import { equalityPredicate, isScalarList, scalarLiteral } from './dialect.js';
import type { AssessmentContext, ComplianceCheck, ControlContext, FilterValue } from './types.js';
import { ComplianceOperator } from './types.js';

/**
 * Maps a field name to the column expression that reads it.
 * Throws UndefinedFieldReferenceError for unknown fields.
 */
export type ColumnResolver = (field: string) => string;

export interface FilterEntry {
  readonly field: string;
  readonly value: FilterValue;
}

/**
 * Assessment filters first, then control filters
 */
export function filterEntries(control: ControlContext, assessment: AssessmentContext): FilterEntry[] {
  const entries: FilterEntry[] = [];
  for (const [field, value] of Object.entries(assessment.filters ?? {})) {
    entries.push({ field, value });
  }
  for (const [field, value] of Object.entries(control.filters ?? {})) {
    entries.push({ field, value });
  }
  return entries;
}

export function buildFilterPredicates(
  entries: readonly FilterEntry[],
  resolve: ColumnResolver
): string[] {
  return entries.map((entry) => equalityPredicate(resolve(entry.field), entry.value));
}

export function whereClause(predicates: readonly string[]): string | null {
  return predicates.length > 0 ? `WHERE ${predicates.join('\n  AND ')}` : null;
}

const COMPARISON: Record<'gt' | 'gte' | 'lt' | 'lte', string> = {
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

function requireValue(check: ComplianceCheck): FilterValue {
  if (check.value === undefined) {
    throw new SqlSynthesisError(
      ErrorCode.INVALID_INPUT,
      `Compliance check '${check.operator}' on ${check.field} needs a value`,
      { field: check.field, operator: check.operator }
    );
  }
  return check.value;
}

function requireScalar(check: ComplianceCheck): string | number | boolean {
  const value = requireValue(check);
  if (value === null || isScalarList(value)) {
    throw new SqlSynthesisError(
      ErrorCode.INVALID_INPUT,
      `Compliance check '${check.operator}' on ${check.field} needs a single value`,
      { field: check.field, operator: check.operator }
    );
  }
  return value;
}

/**
 * Condition under which a row counts as compliant
 */
export function complianceCondition(check: ComplianceCheck, resolve: ColumnResolver): string {
  const column = resolve(check.field);

  switch (check.operator) {
    case ComplianceOperator.EQ:
    case ComplianceOperator.IN:
      return equalityPredicate(column, requireValue(check));
    case ComplianceOperator.NEQ: {
      const value = requireValue(check);
      if (value === null) {
        return `${column} IS NOT NULL`;
      }
      return `NOT (${equalityPredicate(column, value)})`;
    }
    case ComplianceOperator.GT:
    case ComplianceOperator.GTE:
    case ComplianceOperator.LT:
    case ComplianceOperator.LTE:
      return `${column} ${COMPARISON[check.operator]} ${scalarLiteral(requireScalar(check))}`;
    case ComplianceOperator.IS_NULL:
      return `${column} IS NULL`;
    case ComplianceOperator.NOT_NULL:
      return `${column} IS NOT NULL`;
  }
}
