/**
 * Compliance Rollup Evaluator for Policy Compiler
 *
 * Folds leaf rule outcomes up the control tree. A parent is COMPLIANT only
 * when every child is; a single NON_COMPLIANT child makes it NON_COMPLIANT;
 * anything else is UNEVALUATED. Nothing is cached: every call recomputes
 * from the current tree.
 */

import type { Assessment, Control } from '../hierarchy/types.js';

export const ComplianceState = {
  COMPLIANT: 'COMPLIANT',
  NON_COMPLIANT: 'NON_COMPLIANT',
  UNEVALUATED: 'UNEVALUATED',
} as const;

export type ComplianceStateValue = (typeof ComplianceState)[keyof typeof ComplianceState];

/**
 * Leaf states supplied by the caller, keyed by alias; they take precedence
 * over the attached rule's last evaluation
 */
export type LeafStateOverrides = ReadonlyMap<string, ComplianceStateValue>;

export interface ControlCompliance {
  readonly alias: string;
  readonly name: string;
  readonly state: ComplianceStateValue;
  readonly children: readonly ControlCompliance[];
}

export interface ComplianceReport {
  readonly assessment: string;
  readonly state: ComplianceStateValue;
  readonly controls: readonly ControlCompliance[];
  /** Leaf counts per state */
  readonly leafCounts: Readonly<Record<ComplianceStateValue, number>>;
}

/**
 * Combine child states
 */
export function combineStates(states: readonly ComplianceStateValue[]): ComplianceStateValue {
  if (states.length === 0) {
    return ComplianceState.UNEVALUATED;
  }
  if (states.some((s) => s === ComplianceState.NON_COMPLIANT)) {
    return ComplianceState.NON_COMPLIANT;
  }
  if (states.every((s) => s === ComplianceState.COMPLIANT)) {
    return ComplianceState.COMPLIANT;
  }
  return ComplianceState.UNEVALUATED;
}

function leafState(control: Control, overrides: LeafStateOverrides): ComplianceStateValue {
  return overrides.get(control.alias) ?? control.rule?.lastEvaluation ?? ComplianceState.UNEVALUATED;
}

function evaluateControl(
  control: Control,
  overrides: LeafStateOverrides,
  counts: Record<ComplianceStateValue, number>
): ControlCompliance {
  if (control.isLeaf) {
    const state = leafState(control, overrides);
    counts[state] += 1;
    return { alias: control.alias, name: control.name, state, children: [] };
  }

  const children = control.planControls.map((child) => evaluateControl(child, overrides, counts));
  return {
    alias: control.alias,
    name: control.name,
    state: combineStates(children.map((c) => c.state)),
    children,
  };
}

/**
 * Evaluate the compliance of every control and of the assessment as a whole
 */
export function evaluateCompliance(
  assessment: Assessment,
  overrides: LeafStateOverrides = new Map()
): ComplianceReport {
  const counts: Record<ComplianceStateValue, number> = {
    COMPLIANT: 0,
    NON_COMPLIANT: 0,
    UNEVALUATED: 0,
  };
  const controls = assessment.planControls.map((c) => evaluateControl(c, overrides, counts));

  return {
    assessment: assessment.name,
    state: combineStates(controls.map((c) => c.state)),
    controls,
    leafCounts: counts,
  };
}

/**
 * A row produced by the compliance-summary query
 */
export interface ComplianceSummaryRow {
  readonly total_count: number | string;
  readonly non_compliant_count: number | string;
}

/**
 * Map a compliance-summary row to a leaf state.
 * A scope with no rows has nothing to judge and stays UNEVALUATED.
 */
export function complianceStateFromSummary(row: ComplianceSummaryRow): ComplianceStateValue {
  const total = Number(row.total_count);
  const nonCompliant = Number(row.non_compliant_count);
  if (!Number.isFinite(total) || !Number.isFinite(nonCompliant) || total <= 0) {
    return ComplianceState.UNEVALUATED;
  }
  return nonCompliant > 0 ? ComplianceState.NON_COMPLIANT : ComplianceState.COMPLIANT;
}

/**
 * Roll several summary rows (one per scope) into one leaf state
 */
export function complianceStateFromSummaries(
  rows: readonly ComplianceSummaryRow[]
): ComplianceStateValue {
  return combineStates(rows.map(complianceStateFromSummary));
}
