/**
 * Control-link graph model for Policy Compiler
 *
 * The graph is owned by an external store and read through
 * ControlGraphReader. Links are directed, may form cycles and carry an
 * optional reference type. Empty results are normal, not errors.
 */

/**
 * Directed link from one control config to another
 */
export interface ControlLink {
  readonly targetId: string;
  readonly referenceType?: string;
}

/**
 * A named evidence data source attached to a control
 */
export interface EvidenceConfig {
  readonly id: string;
  /** Table name used verbatim in synthesized SQL */
  readonly name: string;
  readonly description?: string;
  /** Source file the evidence was loaded from, when known */
  readonly fileName?: string;
}

export interface EvidenceField {
  readonly name: string;
  /** Declared column type, e.g. "STRING", "TIMESTAMP", "BOOLEAN" */
  readonly type: string;
  /** Column mode, e.g. "NULLABLE", "REQUIRED" */
  readonly mode?: string;
  readonly order: number;
}

export interface EvidenceSchema {
  readonly evidenceConfigId: string;
  /** Sorted by `order` */
  readonly fields: readonly EvidenceField[];
}

/**
 * Read-only access to the control graph
 */
export interface ControlGraphReader {
  getLinkedControls(controlId: string): Promise<readonly ControlLink[]>;
  getEvidenceConfigs(controlId: string): Promise<readonly EvidenceConfig[]>;
  /** Resolves null when the evidence config has no schema */
  getEvidenceSchema(evidenceConfigId: string): Promise<EvidenceSchema | null>;
}

export const TraversalWarningKind = {
  /** An evidence schema was missing or could not be read */
  SCHEMA_RESOLUTION_FAILURE: 'SCHEMA_RESOLUTION_FAILURE',
  /** Depth or node bound reached; the result is partial */
  TRAVERSAL_TRUNCATED: 'TRAVERSAL_TRUNCATED',
  /** Links or evidence configs of a control could not be read */
  BRANCH_READ_FAILURE: 'BRANCH_READ_FAILURE',
} as const;

export type TraversalWarningKindValue =
  (typeof TraversalWarningKind)[keyof typeof TraversalWarningKind];

export interface TraversalWarning {
  readonly kind: TraversalWarningKindValue;
  readonly message: string;
  readonly controlId?: string;
  readonly evidenceConfigId?: string;
}

export interface VisitedControl {
  readonly id: string;
  /** Distance from the start control (0 = start) */
  readonly depth: number;
  /** Control whose link led here */
  readonly discoveredFrom?: string;
  readonly referenceType?: string;
}

/**
 * An evidence config with its resolved schema
 */
export interface ResolvedEvidence {
  readonly config: EvidenceConfig;
  readonly schema: EvidenceSchema;
  /** Controls that reference this evidence, in discovery order */
  readonly controlIds: readonly string[];
}

export interface TraversalOptions {
  readonly maxDepth?: number;
  readonly maxNodes?: number;
  /** Concurrent reads within one level */
  readonly concurrency?: number;
}

export interface TraversalResult {
  readonly startId: string;
  /** Breadth-first discovery order */
  readonly visited: readonly VisitedControl[];
  /** Keyed by evidence config id, in discovery order */
  readonly evidence: ReadonlyMap<string, ResolvedEvidence>;
  readonly warnings: readonly TraversalWarning[];
  readonly truncated: boolean;
}
