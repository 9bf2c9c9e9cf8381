/**
 * SQL Synthesis Engine for Policy Compiler
 *
 * Turns the evidence schemas reachable from a control into two queries:
 *
 * - a selection query returning the evidence rows in scope
 * - a compliance-summary query counting compliant and non-compliant rows
 *   per scope key
 *
 * Tables are the evidence config names, used verbatim. Both queries read
 * the same FROM clause and the same WHERE predicates. Every field either
 * query references must exist in the resolved schemas; a query that
 * references an unknown field fails on its own without affecting the other.
 */

import {
  ErrorCode,
  SqlSynthesisError,
  UndefinedFieldReferenceError,
} from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import type { ResolvedEvidence, TraversalResult } from '../graph/types.js';
import { qualifiedColumn, quoteIdentifier } from './dialect.js';
import { planQuery } from './planner.js';
import type { ColumnResolver } from './predicates.js';
import {
  buildFilterPredicates,
  complianceCondition,
  filterEntries,
  whereClause,
} from './predicates.js';
import type {
  AssessmentContext,
  ControlContext,
  QueryPlan,
  SqlArtifact,
  SynthesisOptions,
  SynthesisOutcome,
  SynthesisResult,
} from './types.js';

export const UNION_ROWS_ALIAS = 'evidence_rows';

export type EvidenceInput = readonly ResolvedEvidence[] | TraversalResult;

export interface PerEvidenceResult {
  readonly evidenceConfigId: string;
  readonly evidenceName: string;
  readonly result: SynthesisResult;
}

type CombinablePlan = Exclude<QueryPlan, { kind: 'NONE' }>;

/**
 * Evidence as a list, whatever form it came in
 */
export function evidenceList(input: EvidenceInput): readonly ResolvedEvidence[] {
  return 'startId' in input ? Array.from(input.evidence.values()) : input;
}

/**
 * Records every field a query references while resolving it to a column
 */
class FieldTracker {
  readonly fields: string[] = [];
  readonly resolve: ColumnResolver;

  constructor(lookup: ColumnResolver) {
    this.resolve = (field) => {
      const column = lookup(field);
      if (!this.fields.includes(field)) {
        this.fields.push(field);
      }
      return column;
    };
  }
}

function tablesOf(plan: QueryPlan): string[] {
  return plan.sources.map((source) => source.config.name);
}

function hasField(source: ResolvedEvidence, field: string): boolean {
  return source.schema.fields.some((f) => f.name === field);
}

function undefinedField(field: string, plan: QueryPlan): UndefinedFieldReferenceError {
  const tables = tablesOf(plan);
  return new UndefinedFieldReferenceError(
    field,
    `Field '${field}' is not defined in evidence ${tables.join(', ')}`,
    { tables }
  );
}

function noSharedKey(plan: QueryPlan, scopeKey: string | undefined): UndefinedFieldReferenceError {
  const tables = tablesOf(plan);
  return new UndefinedFieldReferenceError(
    scopeKey ?? '<join key>',
    `No field is shared by every evidence schema (${tables.join(', ')}); synthesize per evidence instead`,
    { reason: 'no_shared_key', tables }
  );
}

/**
 * Column expression for a field, per plan shape
 */
function columnResolver(plan: CombinablePlan, qualified: boolean): ColumnResolver {
  return (field) => {
    if (plan.kind !== 'JOIN') {
      if (!plan.sources.every((source) => hasField(source, field))) {
        throw undefinedField(field, plan);
      }
      return quoteIdentifier(field);
    }
    const owner = plan.sources.find((source) => hasField(source, field));
    if (!owner) {
      throw undefinedField(field, plan);
    }
    return qualified ? qualifiedColumn(owner.config.name, field) : quoteIdentifier(field);
  };
}

function fromLines(
  plan: Extract<QueryPlan, { kind: 'SINGLE' | 'JOIN' }>,
  tracker: FieldTracker
): string[] {
  const [first, ...rest] = plan.sources;
  if (!first) {
    return [];
  }
  const lines = [`FROM ${quoteIdentifier(first.config.name)}`];
  if (plan.kind === 'JOIN') {
    // The ON clause references the key even when it is not selected
    tracker.resolve(plan.joinKey);
    for (const source of rest) {
      lines.push(
        `JOIN ${quoteIdentifier(source.config.name)} ON ${qualifiedColumn(
          source.config.name,
          plan.joinKey
        )} = ${qualifiedColumn(first.config.name, plan.joinKey)}`
      );
    }
  }
  return lines;
}

/**
 * SQL Synthesizer
 */
export class SqlSynthesizer {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Plan and build both queries. Each outcome succeeds or fails on its own.
   */
  synthesize(
    input: EvidenceInput,
    control: ControlContext = {},
    assessment: AssessmentContext = {},
    options: SynthesisOptions = {}
  ): SynthesisResult {
    let plan: QueryPlan;
    try {
      plan = planQuery(evidenceList(input), this.planOptions(control));
    } catch (err) {
      if (err instanceof SqlSynthesisError) {
        const failed: SynthesisOutcome = { ok: false, error: err };
        return { plan: 'NONE', selection: failed, summary: failed };
      }
      throw err;
    }

    return {
      plan: plan.kind,
      selection: this.attempt(() => this.selectionFor(plan, control, assessment, options)),
      summary: this.attempt(() => this.summaryFor(plan, control, assessment)),
    };
  }

  /**
   * @throws SqlSynthesisError
   */
  synthesizeSelection(
    input: EvidenceInput,
    control: ControlContext = {},
    assessment: AssessmentContext = {},
    options: SynthesisOptions = {}
  ): SqlArtifact {
    const plan = planQuery(evidenceList(input), this.planOptions(control));
    return this.selectionFor(plan, control, assessment, options);
  }

  /**
   * @throws SqlSynthesisError
   */
  synthesizeSummary(
    input: EvidenceInput,
    control: ControlContext = {},
    assessment: AssessmentContext = {}
  ): SqlArtifact {
    const plan = planQuery(evidenceList(input), this.planOptions(control));
    return this.summaryFor(plan, control, assessment);
  }

  /**
   * One query pair per evidence config, for evidence that cannot be combined
   */
  synthesizePerEvidence(
    input: EvidenceInput,
    control: ControlContext = {},
    assessment: AssessmentContext = {},
    options: SynthesisOptions = {}
  ): PerEvidenceResult[] {
    return evidenceList(input).map((source) => ({
      evidenceConfigId: source.config.id,
      evidenceName: source.config.name,
      result: this.synthesize([source], control, assessment, options),
    }));
  }

  private planOptions(control: ControlContext): { scopeKey?: string } {
    return control.scopeKey !== undefined ? { scopeKey: control.scopeKey } : {};
  }

  private attempt(build: () => SqlArtifact): SynthesisOutcome {
    try {
      return { ok: true, artifact: build() };
    } catch (err) {
      if (err instanceof SqlSynthesisError) {
        this.logger.debug('query synthesis failed', { code: err.code, message: err.message });
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  private combinable(plan: QueryPlan, control: ControlContext): CombinablePlan {
    if (plan.kind === 'NONE') {
      throw noSharedKey(plan, control.scopeKey);
    }
    this.logger.debug('query plan', {
      kind: plan.kind,
      tables: tablesOf(plan),
      ...(plan.kind === 'JOIN' ? { joinKey: plan.joinKey } : {}),
    });
    return plan;
  }

  private selectionFor(
    rawPlan: QueryPlan,
    control: ControlContext,
    assessment: AssessmentContext,
    options: SynthesisOptions
  ): SqlArtifact {
    const plan = this.combinable(rawPlan, control);
    const tracker = new FieldTracker(columnResolver(plan, true));
    const entries = filterEntries(control, assessment);

    let sql: string;
    if (plan.kind === 'UNION') {
      const columns = options.columns ?? plan.columns;
      const select = `SELECT ${columns.map((c) => tracker.resolve(c)).join(', ')}`;
      const where = whereClause(buildFilterPredicates(entries, tracker.resolve));
      sql = plan.sources
        .map((source) =>
          [select, `FROM ${quoteIdentifier(source.config.name)}`, where]
            .filter((line): line is string => line !== null)
            .join('\n')
        )
        .join('\nUNION ALL\n');
    } else {
      const select = `SELECT ${this.joinSelectList(plan, options.columns, tracker).join(', ')}`;
      const where = whereClause(buildFilterPredicates(entries, tracker.resolve));
      sql = [select, ...fromLines(plan, tracker), where]
        .filter((line): line is string => line !== null)
        .join('\n');
    }

    return { kind: 'selection', sql, tables: tablesOf(plan), fields: tracker.fields };
  }

  /**
   * Select list for SINGLE and JOIN plans. In a join the key is selected
   * once and same-named columns from different tables are aliased
   * `<table>_<field>`.
   */
  private joinSelectList(
    plan: Extract<QueryPlan, { kind: 'SINGLE' | 'JOIN' }>,
    requested: readonly string[] | undefined,
    tracker: FieldTracker
  ): string[] {
    if (plan.kind === 'SINGLE') {
      const columns = requested ?? plan.sources[0].schema.fields.map((f) => f.name);
      return columns.map((c) => tracker.resolve(c));
    }

    const occurrences = new Map<string, number>();
    for (const source of plan.sources) {
      for (const field of source.schema.fields) {
        occurrences.set(field.name, (occurrences.get(field.name) ?? 0) + 1);
      }
    }

    const wanted = requested !== undefined ? new Set(requested) : undefined;
    for (const column of requested ?? []) {
      tracker.resolve(column);
    }

    const list: string[] = [];
    const [first] = plan.sources;
    if (first && (wanted === undefined || wanted.has(plan.joinKey))) {
      list.push(qualifiedColumn(first.config.name, plan.joinKey));
      tracker.resolve(plan.joinKey);
    }

    for (const source of plan.sources) {
      for (const field of source.schema.fields) {
        if (field.name === plan.joinKey || (wanted !== undefined && !wanted.has(field.name))) {
          continue;
        }
        tracker.resolve(field.name);
        const column = qualifiedColumn(source.config.name, field.name);
        list.push(
          (occurrences.get(field.name) ?? 0) > 1
            ? `${column} AS ${quoteIdentifier(`${source.config.name}_${field.name}`)}`
            : column
        );
      }
    }
    return list;
  }

  private summaryFor(
    rawPlan: QueryPlan,
    control: ControlContext,
    assessment: AssessmentContext
  ): SqlArtifact {
    const check = control.complianceCheck;
    if (check === undefined) {
      throw new SqlSynthesisError(
        ErrorCode.MISSING_COMPLIANCE_CHECK,
        'The compliance summary needs a compliance check'
      );
    }
    const plan = this.combinable(rawPlan, control);
    const entries = filterEntries(control, assessment);

    let from: string[];
    let where: string | null;
    let tracker: FieldTracker;

    if (plan.kind === 'UNION') {
      tracker = new FieldTracker(columnResolver(plan, false));
      const select = `SELECT ${plan.columns.map(quoteIdentifier).join(', ')}`;
      const innerWhere = whereClause(buildFilterPredicates(entries, tracker.resolve));
      const branches = plan.sources
        .map((source) =>
          [select, `FROM ${quoteIdentifier(source.config.name)}`, innerWhere]
            .filter((line): line is string => line !== null)
            .map((line) => `  ${line.replace(/\n/g, '\n  ')}`)
            .join('\n')
        )
        .join('\n  UNION ALL\n');
      from = [`FROM (\n${branches}\n) AS ${quoteIdentifier(UNION_ROWS_ALIAS)}`];
      where = null;
    } else {
      tracker = new FieldTracker(columnResolver(plan, true));
      from = fromLines(plan, tracker);
      where = whereClause(buildFilterPredicates(entries, tracker.resolve));
    }

    const scope = control.scopeKey !== undefined ? tracker.resolve(control.scopeKey) : undefined;
    const condition = complianceCondition(check, tracker.resolve);
    const failing = `SUM(CASE WHEN ${condition} THEN 0 ELSE 1 END)`;

    const columns = [
      ...(scope !== undefined ? [scope] : []),
      `COUNT(*) AS ${quoteIdentifier('total_count')}`,
      `SUM(CASE WHEN ${condition} THEN 1 ELSE 0 END) AS ${quoteIdentifier('compliant_count')}`,
      `${failing} AS ${quoteIdentifier('non_compliant_count')}`,
      `CASE WHEN ${failing} = 0 THEN 'COMPLIANT' ELSE 'NON_COMPLIANT' END AS ${quoteIdentifier(
        'compliance_status'
      )}`,
    ];

    const sql = [
      'SELECT',
      columns.map((c) => `  ${c}`).join(',\n'),
      ...from,
      where,
      scope !== undefined ? `GROUP BY ${scope}` : null,
    ]
      .filter((line): line is string => line !== null)
      .join('\n');

    return { kind: 'summary', sql, tables: tablesOf(plan), fields: tracker.fields };
  }
}

/**
 * Create a SQL synthesizer
 */
export function createSqlSynthesizer(options?: { logger?: Logger }): SqlSynthesizer {
  return new SqlSynthesizer(options);
}
