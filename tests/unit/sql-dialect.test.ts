import { describe, it, expect } from '@jest/globals';
import { ErrorCode, SqlSynthesisError } from '../../src/core/errors.js';
import {
  equalityPredicate,
  qualifiedColumn,
  quoteIdentifier,
  scalarLiteral,
  typeFamily,
} from '../../src/sql/dialect.js';
import { chooseJoinKey } from '../../src/sql/planner.js';
import {
  buildFilterPredicates,
  complianceCondition,
  filterEntries,
  whereClause,
} from '../../src/sql/predicates.js';
import type { ComplianceCheck } from '../../src/sql/types.js';

describe('SQL Dialect', () => {
  it('should classify column types into families', () => {
    expect(typeFamily('varchar(255)')).toBe('string');
    expect(typeFamily('INT64')).toBe('number');
    expect(typeFamily('bool')).toBe('boolean');
    expect(typeFamily('DATETIME')).toBe('timestamp');
    expect(typeFamily('geography')).toBe('other:GEOGRAPHY');
  });

  it('should quote identifiers and literals', () => {
    expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
    expect(qualifiedColumn('Devices', 'status')).toBe('"Devices"."status"');
    expect(scalarLiteral("O'Brien")).toBe("'O''Brien'");
    expect(scalarLiteral(false)).toBe('FALSE');
    expect(scalarLiteral(-2.5)).toBe('-2.5');
  });

  it('should refuse non-finite numbers', () => {
    expect(() => scalarLiteral(Number.POSITIVE_INFINITY)).toThrow(SqlSynthesisError);
  });

  it('should render equality for every filter shape', () => {
    expect(equalityPredicate('"a"', null)).toBe('"a" IS NULL');
    expect(equalityPredicate('"a"', 'x')).toBe(`"a" = 'x'`);
    expect(equalityPredicate('"a"', [1, 2])).toBe('"a" IN (1, 2)');
    expect(equalityPredicate('"a"', [])).toBe('FALSE');
  });
});

describe('Filter Predicates', () => {
  it('should order assessment filters before control filters', () => {
    const entries = filterEntries(
      { filters: { status: 'active' } },
      { filters: { region: ['eu', 'us'] } }
    );

    expect(entries).toEqual([
      { field: 'region', value: ['eu', 'us'] },
      { field: 'status', value: 'active' },
    ]);
    expect(whereClause(buildFilterPredicates(entries, quoteIdentifier))).toBe(
      `WHERE "region" IN ('eu', 'us')\n  AND "status" = 'active'`
    );
  });

  it('should omit the WHERE clause without predicates', () => {
    expect(whereClause([])).toBeNull();
    expect(filterEntries({}, {})).toEqual([]);
  });

  it('should render every compliance operator', () => {
    const render = (check: ComplianceCheck): string => complianceCondition(check, quoteIdentifier);

    expect(render({ field: 'a', operator: 'eq', value: 'x' })).toBe(`"a" = 'x'`);
    expect(render({ field: 'a', operator: 'in', value: ['x', 'y'] })).toBe(`"a" IN ('x', 'y')`);
    expect(render({ field: 'a', operator: 'neq', value: null })).toBe('"a" IS NOT NULL');
    expect(render({ field: 'a', operator: 'neq', value: 'x' })).toBe(`NOT ("a" = 'x')`);
    expect(render({ field: 'a', operator: 'gte', value: 3 })).toBe('"a" >= 3');
    expect(render({ field: 'a', operator: 'lt', value: 10 })).toBe('"a" < 10');
    expect(render({ field: 'a', operator: 'is_null' })).toBe('"a" IS NULL');
    expect(render({ field: 'a', operator: 'not_null' })).toBe('"a" IS NOT NULL');
  });

  it('should require a value where the operator needs one', () => {
    expect(() => complianceCondition({ field: 'a', operator: 'gt' }, quoteIdentifier)).toThrow(
      "Compliance check 'gt' on a needs a value"
    );
    expect(() =>
      complianceCondition({ field: 'a', operator: 'lt', value: [1, 2] }, quoteIdentifier)
    ).toThrow(expect.objectContaining({ code: ErrorCode.INVALID_INPUT }));
  });
});

describe('Join Key Choice', () => {
  it('should prefer the scope key, then identifier-like names', () => {
    expect(chooseJoinKey(['employee_id', 'status'], 'status')).toBe('status');
    expect(chooseJoinKey(['status', 'employee_id'])).toBe('employee_id');
    expect(chooseJoinKey(['status', 'userId'])).toBe('userId');
    expect(chooseJoinKey(['status', 'paid'], 'missing')).toBe('status');
    expect(chooseJoinKey([])).toBeUndefined();
  });
});
