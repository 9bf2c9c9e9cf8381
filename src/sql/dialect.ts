/**
 * SQL rendering helpers: identifiers, literals and column type families.
 */

import { ErrorCode, SqlSynthesisError } from '../core/errors.js';
import type { FilterValue, ScalarFilterValue } from './types.js';

export type TypeFamily = 'string' | 'number' | 'boolean' | 'timestamp' | `other:${string}`;

const STRING_TYPES = /^(?:STRING|TEXT|VARCHAR|CHAR|NVARCHAR|NCHAR|CHARACTER(?: VARYING)?|UUID|JSON|BYTES)\b/;
const NUMBER_TYPES =
  /^(?:INT|INTEGER|INT64|BIGINT|SMALLINT|TINYINT|FLOAT|FLOAT64|DOUBLE|REAL|NUMERIC|BIGNUMERIC|DECIMAL|NUMBER)\b/;
const BOOLEAN_TYPES = /^(?:BOOL|BOOLEAN)$/;
const TIMESTAMP_TYPES = /^(?:TIMESTAMP|TIMESTAMPTZ|DATETIME|DATE|TIME)\b/;

/**
 * Coarse family of a declared column type. Columns of the same family are
 * compatible for UNION and JOIN.
 */
export function typeFamily(type: string): TypeFamily {
  const normalized = type.trim().toUpperCase();
  if (STRING_TYPES.test(normalized)) return 'string';
  if (NUMBER_TYPES.test(normalized)) return 'number';
  if (BOOLEAN_TYPES.test(normalized)) return 'boolean';
  if (TIMESTAMP_TYPES.test(normalized)) return 'timestamp';
  return `other:${normalized}`;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * `"table"."column"`
 */
export function qualifiedColumn(table: string, column: string): string {
  return `${quoteIdentifier(table)}.${quoteIdentifier(column)}`;
}

export function scalarLiteral(value: ScalarFilterValue): string {
  if (typeof value === 'string') {
    return `'${value.replace(/'/g, "''")}'`;
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE';
  }
  if (!Number.isFinite(value)) {
    throw new SqlSynthesisError(ErrorCode.INVALID_INPUT, `Cannot render ${value} as a SQL literal`);
  }
  return String(value);
}

export function isScalarList(value: FilterValue): value is readonly ScalarFilterValue[] {
  return Array.isArray(value);
}

/**
 * Equality predicate for a filter value
 */
export function equalityPredicate(column: string, value: FilterValue): string {
  if (value === null) {
    return `${column} IS NULL`;
  }
  if (isScalarList(value)) {
    if (value.length === 0) {
      return 'FALSE';
    }
    return `${column} IN (${value.map(scalarLiteral).join(', ')})`;
  }
  return `${column} = ${scalarLiteral(value)}`;
}
