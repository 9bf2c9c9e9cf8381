import { describe, it, expect } from '@jest/globals';
import {
  ComplianceState,
  combineStates,
  complianceStateFromSummaries,
  complianceStateFromSummary,
  evaluateCompliance,
} from '../../src/compliance/rollup.js';
import { assignAliases } from '../../src/hierarchy/aliases.js';
import type { Assessment } from '../../src/hierarchy/types.js';

const assessment: Assessment = {
  name: 'Access Control Policy',
  description: '',
  categoryName: 'Access Management',
  planControls: assignAliases([
    {
      name: 'MFA Enforcement',
      description: '',
      planControls: [
        { name: 'Remote', description: '', rule: { name: 'r1', lastEvaluation: 'COMPLIANT' } },
        { name: 'Admin', description: '', rule: { name: 'r2', lastEvaluation: 'COMPLIANT' } },
      ],
    },
    { name: 'Review Access', description: '', rule: { name: 'r3' } },
  ]),
};

describe('Compliance Rollup', () => {
  describe('combineStates', () => {
    it('should follow the rollup rules', () => {
      expect(combineStates([])).toBe(ComplianceState.UNEVALUATED);
      expect(combineStates(['COMPLIANT', 'COMPLIANT'])).toBe(ComplianceState.COMPLIANT);
      expect(combineStates(['COMPLIANT', 'UNEVALUATED'])).toBe(ComplianceState.UNEVALUATED);
      expect(combineStates(['UNEVALUATED', 'NON_COMPLIANT'])).toBe(ComplianceState.NON_COMPLIANT);
    });
  });

  describe('evaluateCompliance', () => {
    it('should roll leaf outcomes up to parents', () => {
      const report = evaluateCompliance(assessment);

      expect(report.assessment).toBe('Access Control Policy');
      expect(report.controls.map((c) => [c.alias, c.state])).toEqual([
        ['1', 'COMPLIANT'],
        ['2', 'UNEVALUATED'],
      ]);
      expect(report.state).toBe(ComplianceState.UNEVALUATED);
      expect(report.leafCounts).toEqual({ COMPLIANT: 2, NON_COMPLIANT: 0, UNEVALUATED: 1 });
    });

    it('should let one non-compliant leaf fail the whole assessment', () => {
      const report = evaluateCompliance(
        assessment,
        new Map([
          ['1.2', ComplianceState.NON_COMPLIANT],
          ['2', ComplianceState.COMPLIANT],
        ])
      );

      expect(report.controls[0]?.state).toBe(ComplianceState.NON_COMPLIANT);
      expect(report.controls[0]?.children.map((c) => c.state)).toEqual([
        'COMPLIANT',
        'NON_COMPLIANT',
      ]);
      expect(report.state).toBe(ComplianceState.NON_COMPLIANT);
    });

    it('should be compliant only when every leaf is', () => {
      const report = evaluateCompliance(assessment, new Map([['2', ComplianceState.COMPLIANT]]));

      expect(report.state).toBe(ComplianceState.COMPLIANT);
    });

    it('should treat an empty assessment as unevaluated', () => {
      expect(evaluateCompliance({ ...assessment, planControls: [] }).state).toBe(
        ComplianceState.UNEVALUATED
      );
    });
  });

  describe('complianceStateFromSummary', () => {
    it('should map summary rows to leaf states', () => {
      expect(complianceStateFromSummary({ total_count: 4, non_compliant_count: 0 })).toBe('COMPLIANT');
      expect(complianceStateFromSummary({ total_count: '4', non_compliant_count: '1' })).toBe(
        'NON_COMPLIANT'
      );
      expect(complianceStateFromSummary({ total_count: 0, non_compliant_count: 0 })).toBe(
        'UNEVALUATED'
      );
      expect(complianceStateFromSummary({ total_count: 'n/a', non_compliant_count: 0 })).toBe(
        'UNEVALUATED'
      );
    });

    it('should combine one row per scope', () => {
      expect(
        complianceStateFromSummaries([
          { total_count: 2, non_compliant_count: 0 },
          { total_count: 3, non_compliant_count: 2 },
        ])
      ).toBe('NON_COMPLIANT');
      expect(complianceStateFromSummaries([])).toBe('UNEVALUATED');
    });
  });
});
