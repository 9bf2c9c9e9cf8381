/**
 * End-to-end: policy text to a linted Assessment, and a control graph to
 * previewed SQL whose summary rows drive the compliance rollup.
 */

import { describe, it, expect } from '@jest/globals';
import { compileDocument } from '../../cli/commands.js';
import { AssessmentLinter } from '../../cli/lint.js';
import { DEFAULT_CONFIG } from '../../src/config.js';
import { MemorySink, createLogger } from '../../src/core/logging/logger.js';
import {
  ComplianceState,
  complianceStateFromSummaries,
  evaluateCompliance,
} from '../../src/compliance/rollup.js';
import { parseAssessment } from '../../src/hierarchy/assessment-document.js';
import { loadControlGraph } from '../../src/graph/memory-graph.js';
import { ControlLinkTraverser } from '../../src/graph/traversal.js';
import { previewArtifact } from '../../src/sql/preview.js';
import type { SqlExecutor, SqlRow } from '../../src/sql/preview.js';
import { createSqlRuleDraft } from '../../src/sql/rule-draft.js';
import { SqlSynthesizer } from '../../src/sql/synthesizer.js';
import type { SqlArtifact, SynthesisOutcome } from '../../src/sql/types.js';
import graphFixture from '../fixtures/control-graph.json';

const MFA_POLICY =
  'The organization must enforce MFA for all remote access and administrative accounts.';

function artifactOf(outcome: SynthesisOutcome): SqlArtifact {
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.artifact;
}

describe('Policy Compiler Pipeline', () => {
  it('should compile, lint and reload a policy', () => {
    const sink = new MemorySink();
    const compiled = compileDocument(
      MFA_POLICY,
      { name: 'Access Control Policy' },
      { config: DEFAULT_CONFIG, logger: createLogger({ sink }) }
    );

    const reloaded = parseAssessment(compiled.yaml);
    const lint = new AssessmentLinter().lint(reloaded);

    expect(reloaded).toEqual(compiled.assessment);
    expect(lint.passed).toBe(true);
    expect(lint.controlsChecked).toBe(3);
    expect(reloaded.planControls.map((c) => [c.alias, c.isLeaf])).toEqual([['1', false]]);
    expect(reloaded.planControls[0]?.planControls.map((c) => [c.alias, c.isLeaf])).toEqual([
      ['1.1', true],
      ['1.2', true],
    ]);
  });

  it('should turn evidence samples into a compliance rollup', async () => {
    const { assessment } = compileDocument(
      MFA_POLICY,
      { name: 'Access Control Policy' },
      { config: DEFAULT_CONFIG, logger: createLogger({ level: 'silent' }) }
    );

    const traversal = await new ControlLinkTraverser(loadControlGraph(graphFixture)).traverse(
      'ctrl-mfa'
    );
    const result = new SqlSynthesizer().synthesize(traversal, {
      scopeKey: 'user',
      complianceCheck: { field: 'mfa_used', operator: 'eq', value: true },
    });
    const summary = artifactOf(result.summary);

    const summaryRows: SqlRow[] = [
      { user: 'alice', total_count: 3, non_compliant_count: 0 },
      { user: 'bob', total_count: '2', non_compliant_count: '1' },
    ];
    const executed: string[] = [];
    const executor: SqlExecutor = {
      execute: async (sql, { limit }) => {
        executed.push(sql);
        return summaryRows.slice(0, limit);
      },
    };

    const preview = await previewArtifact(executor, summary, DEFAULT_CONFIG.sampleRecords);
    if (!preview.ok) {
      throw new Error(preview.error);
    }
    const remoteState = complianceStateFromSummaries(
      preview.rows.map((row) => ({
        total_count: Number(row['total_count']),
        non_compliant_count: Number(row['non_compliant_count']),
      }))
    );
    const draft = createSqlRuleDraft(summary, 'MfaCoverage');

    const report = evaluateCompliance(
      assessment,
      new Map([
        ['1.1', remoteState],
        ['1.2', ComplianceState.COMPLIANT],
      ])
    );

    expect(result.plan).toBe('UNION');
    expect(executed).toEqual([summary.sql]);
    expect(remoteState).toBe(ComplianceState.NON_COMPLIANT);
    expect(draft.referencedEvidenceNames).toEqual(['LoginEvents', 'AdminLogins']);
    expect(draft.kind).toBe('summary');
    expect(report.controls.map((c) => [c.alias, c.state])).toEqual([['1', 'NON_COMPLIANT']]);
    expect(report.state).toBe(ComplianceState.NON_COMPLIANT);
    expect(report.leafCounts).toEqual({ COMPLIANT: 1, NON_COMPLIANT: 1, UNEVALUATED: 0 });
  });
});
