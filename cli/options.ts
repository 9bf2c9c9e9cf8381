/**
 * Command-line option parsers shared by the CLI commands.
 *
 * Filters are written `field=value`. The value is read as null, a boolean,
 * a number, or a comma-separated list (IN); wrap it in quotes to keep it a
 * plain string. Compliance checks are written `field:operator[:value]`.
 */

import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import type {
  ComplianceCheck,
  FilterValue,
  Filters,
  ScalarFilterValue,
} from '../src/sql/types.js';
import { ComplianceOperator } from '../src/sql/types.js';

const OperatorSchema = z.enum([
  ComplianceOperator.EQ,
  ComplianceOperator.NEQ,
  ComplianceOperator.GT,
  ComplianceOperator.GTE,
  ComplianceOperator.LT,
  ComplianceOperator.LTE,
  ComplianceOperator.IN,
  ComplianceOperator.IS_NULL,
  ComplianceOperator.NOT_NULL,
]);

const NUMBER_RE = /^-?\d+(?:\.\d+)?$/;

function parseScalar(raw: string): ScalarFilterValue {
  const text = raw.trim();
  const quoted = /^(['"])(.*)\1$/.exec(text);
  if (quoted) {
    return quoted[2] ?? '';
  }
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (NUMBER_RE.test(text)) return Number(text);
  return text;
}

export function parseFilterValue(raw: string): FilterValue {
  const text = raw.trim();
  if (text === 'null') {
    return null;
  }
  if (/^(['"]).*\1$/.test(text)) {
    return parseScalar(text);
  }
  if (text.includes(',')) {
    return text
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map(parseScalar);
  }
  return parseScalar(text);
}

/**
 * Parse one `field=value` argument
 */
export function parseFilter(arg: string): [string, FilterValue] {
  const eq = arg.indexOf('=');
  const field = eq === -1 ? '' : arg.slice(0, eq).trim();
  if (field.length === 0) {
    throw new InvalidArgumentError(`Expected field=value, got '${arg}'`);
  }
  return [field, parseFilterValue(arg.slice(eq + 1))];
}

/**
 * Parse `field:operator[:value]`
 */
export function parseComplianceCheck(arg: string): ComplianceCheck {
  const [field, operator, ...rest] = arg.split(':');
  const parsedOperator = OperatorSchema.safeParse(operator?.trim());
  if (field === undefined || field.trim() === '' || !parsedOperator.success) {
    throw new InvalidArgumentError(
      `Expected field:operator[:value] with operator one of ${OperatorSchema.options.join(', ')}, got '${arg}'`
    );
  }
  const value = rest.join(':');
  return value.length > 0
    ? { field: field.trim(), operator: parsedOperator.data, value: parseFilterValue(value) }
    : { field: field.trim(), operator: parsedOperator.data };
}

export function parsePositiveInt(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${raw}'`);
  }
  return value;
}

/**
 * Accumulator for repeatable `--filter field=value` options
 */
export function collectFilter(arg: string, previous: Filters): Filters {
  const [field, value] = parseFilter(arg);
  return { ...previous, [field]: value };
}
