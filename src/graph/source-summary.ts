/**
 * Control source summary.
 *
 * Presents a traversal result as lineage grouped by recursion level, with
 * the evidence each control contributes and its columns, plus the next
 * step a reviewer would take.
 */

import type { TraversalResult, TraversalWarningKindValue } from './types.js';

export const NextAction = {
  /** Evidence is available; sample rows or synthesize queries next */
  SAMPLE_EVIDENCE: 'SAMPLE_EVIDENCE',
  /** Nothing reachable carries a usable evidence schema */
  NO_EVIDENCE_LINKED: 'NO_EVIDENCE_LINKED',
} as const;

export type NextActionValue = (typeof NextAction)[keyof typeof NextAction];

export interface ColumnInfo {
  readonly name: string;
  readonly type: string;
  readonly mode?: string;
}

export interface EvidenceSummary {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly columns: readonly ColumnInfo[];
}

export interface ControlSourceEntry {
  readonly id: string;
  readonly discoveredFrom?: string;
  readonly referenceType?: string;
  readonly evidence: readonly EvidenceSummary[];
}

export interface LineageLevel {
  readonly level: number;
  readonly controls: readonly ControlSourceEntry[];
}

export interface SourceSummary {
  readonly startId: string;
  readonly levels: readonly LineageLevel[];
  readonly evidenceCount: number;
  readonly warningCounts: Partial<Record<TraversalWarningKindValue, number>>;
  readonly truncated: boolean;
  readonly nextAction: NextActionValue;
}

export function buildSourceSummary(result: TraversalResult): SourceSummary {
  const levels = new Map<number, ControlSourceEntry[]>();

  for (const visited of result.visited) {
    const evidence: EvidenceSummary[] = [];
    for (const resolved of result.evidence.values()) {
      if (!resolved.controlIds.includes(visited.id)) {
        continue;
      }
      const columns = resolved.schema.fields.map(
        (field): ColumnInfo =>
          field.mode !== undefined
            ? { name: field.name, type: field.type, mode: field.mode }
            : { name: field.name, type: field.type }
      );
      evidence.push({
        id: resolved.config.id,
        name: resolved.config.name,
        ...(resolved.config.description !== undefined
          ? { description: resolved.config.description }
          : {}),
        columns,
      });
    }

    const entry: ControlSourceEntry = {
      id: visited.id,
      ...(visited.discoveredFrom !== undefined ? { discoveredFrom: visited.discoveredFrom } : {}),
      ...(visited.referenceType !== undefined ? { referenceType: visited.referenceType } : {}),
      evidence,
    };
    const level = levels.get(visited.depth) ?? [];
    level.push(entry);
    levels.set(visited.depth, level);
  }

  const warningCounts: Partial<Record<TraversalWarningKindValue, number>> = {};
  for (const warning of result.warnings) {
    warningCounts[warning.kind] = (warningCounts[warning.kind] ?? 0) + 1;
  }

  return {
    startId: result.startId,
    levels: Array.from(levels.entries())
      .sort(([a], [b]) => a - b)
      .map(([level, controls]) => ({ level, controls })),
    evidenceCount: result.evidence.size,
    warningCounts,
    truncated: result.truncated,
    nextAction: result.evidence.size > 0 ? NextAction.SAMPLE_EVIDENCE : NextAction.NO_EVIDENCE_LINKED,
  };
}

/**
 * Render a source summary as indented text
 */
export function formatSourceSummary(summary: SourceSummary): string {
  const lines: string[] = [`Control ${summary.startId}`];

  for (const level of summary.levels) {
    lines.push(`  Level ${level.level}:`);
    for (const control of level.controls) {
      const via =
        control.discoveredFrom !== undefined
          ? ` (from ${control.discoveredFrom}${control.referenceType ? `, ${control.referenceType}` : ''})`
          : '';
      lines.push(`    ${control.id}${via}`);
      for (const evidence of control.evidence) {
        const columns = evidence.columns.map((c) => `${c.name}:${c.type}`).join(', ');
        lines.push(`      - ${evidence.name} [${columns}]`);
      }
    }
  }

  const warningTotal = Object.values(summary.warningCounts).reduce<number>((a, b) => a + (b ?? 0), 0);
  lines.push(`Evidence: ${summary.evidenceCount}  Warnings: ${warningTotal}`);
  if (summary.truncated) {
    lines.push('Traversal truncated');
  }
  lines.push(`Next: ${summary.nextAction}`);
  return lines.join('\n');
}
