/**
 * Query planner: decides how several evidence tables combine into one query.
 *
 *   SINGLE  one evidence table
 *   UNION   every schema has the same field names with compatible types
 *   JOIN    a field shared by every schema (with compatible types) is used
 *           as the join key
 *   NONE    no way to combine; callers fall back to per-evidence queries
 *
 * Planning is structural only; it never looks at filter values.
 */

import { ErrorCode, SqlSynthesisError } from '../core/errors.js';
import type { EvidenceField, ResolvedEvidence } from '../graph/types.js';
import { typeFamily } from './dialect.js';
import type { QueryPlan } from './types.js';

const IDENTIFIER_LIKE = /^(?:id|key)$|_(?:id|key)$/i;
const CAMEL_ID = /[a-z0-9]Id$/;

export interface PlanOptions {
  /** Preferred join key */
  readonly scopeKey?: string;
}

function fieldMap(evidence: ResolvedEvidence): Map<string, EvidenceField> {
  return new Map(evidence.schema.fields.map((field): [string, EvidenceField] => [field.name, field]));
}

/**
 * Whether the field has a compatible type in every schema
 */
function sharedByAll(name: string, maps: readonly Map<string, EvidenceField>[]): boolean {
  const [first, ...rest] = maps;
  const base = first?.get(name);
  if (!base) {
    return false;
  }
  const family = typeFamily(base.type);
  return rest.every((map) => {
    const field = map.get(name);
    return field !== undefined && typeFamily(field.type) === family;
  });
}

function sameFieldNames(maps: readonly Map<string, EvidenceField>[]): boolean {
  const [first, ...rest] = maps;
  if (!first) {
    return false;
  }
  return rest.every(
    (map) => map.size === first.size && Array.from(first.keys()).every((name) => map.has(name))
  );
}

/**
 * Pick the join key among shared fields: scope key, then identifier-like
 * names, then the first shared field in schema order
 */
export function chooseJoinKey(shared: readonly string[], scopeKey?: string): string | undefined {
  if (scopeKey !== undefined && shared.includes(scopeKey)) {
    return scopeKey;
  }
  return shared.find((name) => IDENTIFIER_LIKE.test(name) || CAMEL_ID.test(name)) ?? shared[0];
}

/**
 * Plan how to combine the evidence.
 *
 * @throws SqlSynthesisError (NO_EVIDENCE) when the list is empty
 */
export function planQuery(evidence: readonly ResolvedEvidence[], options: PlanOptions = {}): QueryPlan {
  const [first, ...rest] = evidence;
  if (first === undefined) {
    throw new SqlSynthesisError(ErrorCode.NO_EVIDENCE, 'No evidence schemas to synthesize from');
  }
  if (rest.length === 0) {
    return { kind: 'SINGLE', sources: [first] };
  }

  const maps = evidence.map(fieldMap);
  const names = first.schema.fields.map((field) => field.name);
  const shared = names.filter((name) => sharedByAll(name, maps));

  if (sameFieldNames(maps) && shared.length === names.length) {
    return { kind: 'UNION', sources: evidence, columns: names };
  }

  const joinKey = chooseJoinKey(shared, options.scopeKey);
  if (joinKey !== undefined) {
    return { kind: 'JOIN', sources: evidence, joinKey };
  }

  return { kind: 'NONE', sources: evidence, reason: 'no_shared_key' };
}
