/**
 * Control hierarchy model for Policy Compiler
 *
 * An Assessment is compiled from one policy document. Its controls form an
 * ordered tree whose aliases are dotted, 1-based, depth-first positions
 * ("1", "1.1", "1.2", "2", ...). Values are immutable: edits return a new
 * Assessment.
 */

/**
 * Outcome of a leaf's attached rule when it last ran
 */
export type RuleOutcome = 'COMPLIANT' | 'NON_COMPLIANT';

/**
 * Rule attached to a leaf control by downstream rule-attachment tooling
 */
export interface AttachedRule {
  readonly name: string;
  readonly lastEvaluation?: RuleOutcome;
}

export interface Control {
  /** Dotted numeric path, e.g. "1.2.3" */
  readonly alias: string;
  /** Human label, normally equal to the alias */
  readonly displayable: string;
  readonly name: string;
  readonly description: string;
  /** True iff the control has no children */
  readonly isLeaf: boolean;
  /** Ordered children */
  readonly planControls: readonly Control[];
  readonly rule?: AttachedRule;
}

export interface Assessment {
  readonly name: string;
  readonly description: string;
  /** Reusable grouping shared by assessments addressing the same theme */
  readonly categoryName: string;
  readonly planControls: readonly Control[];
}

/**
 * Control before aliases are (re)assigned.
 *
 * `alias` is the control's previous alias, if any. A `displayable` equal to
 * it (or absent) is treated as the default label and follows the new alias.
 */
export interface ControlInput {
  readonly alias?: string;
  readonly displayable?: string;
  readonly name: string;
  readonly description: string;
  readonly planControls?: readonly ControlInput[];
  readonly rule?: AttachedRule;
}

/**
 * Summary of a leaf control with its position in the tree
 */
export interface LeafControlSummary {
  readonly alias: string;
  readonly displayable: string;
  readonly name: string;
  /** Names of the ancestors, root first */
  readonly path: readonly string[];
  readonly rule?: AttachedRule;
}
