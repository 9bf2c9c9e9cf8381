import { describe, it, expect } from '@jest/globals';
import {
  compileDocument,
  parseGroupingHints,
  runCompile,
  runLint,
  runSynthesize,
  runTraverse,
} from '../../cli/commands.js';
import type { CommandContext } from '../../cli/commands.js';
import { DEFAULT_CONFIG } from '../../src/config.js';
import { MemorySink, createLogger } from '../../src/core/logging/logger.js';
import { parseAssessment } from '../../src/hierarchy/assessment-document.js';
import graphFixture from '../fixtures/control-graph.json';

const MFA_POLICY =
  'The organization must enforce MFA for all remote access and administrative accounts.';

function context(sink: MemorySink = new MemorySink()): CommandContext {
  return { config: DEFAULT_CONFIG, logger: createLogger({ level: 'debug', sink }) };
}

describe('CLI Commands', () => {
  describe('compile', () => {
    it('should compile a policy into an Assessment document', async () => {
      const result = await runCompile(MFA_POLICY, { name: 'Access Control Policy' }, context());

      expect(result.success).toBe(true);
      expect(result.exitCode).toBe(0);
      const assessment = parseAssessment(result.output);
      expect(assessment.name).toBe('Access Control Policy');
      expect(assessment.categoryName).toBe('Access Management');
      expect(assessment.planControls[0]?.planControls.map((c) => c.alias)).toEqual(['1.1', '1.2']);
    });

    it('should honour the split option and log per subsystem', () => {
      const sink = new MemorySink();
      const compiled = compileDocument(
        MFA_POLICY,
        { name: 'Access Control Policy', splitCompound: false },
        context(sink)
      );

      expect(compiled.extraction.requirements).toHaveLength(1);
      expect(compiled.assessment.planControls[0]?.isLeaf).toBe(true);
      expect(sink.entries.map((e) => e.subsystem)).toEqual([
        'policy-compiler.extraction',
        'policy-compiler.hierarchy',
      ]);
    });

    it('should apply grouping hints', () => {
      const first = compileDocument(MFA_POLICY, { name: 'Access Control Policy' }, context());
      const ids = first.extraction.requirements.map((r) => r.id);

      const hinted = compileDocument(
        MFA_POLICY,
        {
          name: 'Access Control Policy',
          groupingHints: parseGroupingHints([{ name: 'Strong Authentication', requirementIds: ids }]),
        },
        context()
      );

      expect(hinted.assessment.planControls.map((c) => c.name)).toEqual(['Strong Authentication']);
    });

    it('should report documents without requirements', async () => {
      const result = await runCompile('Background only.', { name: 'Empty' }, context());

      expect(result).toEqual({
        success: false,
        exitCode: 1,
        output: '',
        error: 'EXTRACTION_EMPTY: No requirements found in document',
      });
    });

    it('should validate grouping hints', () => {
      expect(() => parseGroupingHints([{ name: '', requirementIds: [] }])).toThrow(
        /^Invalid grouping hints:\n0\.name: /
      );
      expect(parseGroupingHints([{ name: 'Group', requirementIds: ['abc'] }])).toEqual([
        { name: 'Group', requirementIds: ['abc'] },
      ]);
    });
  });

  describe('lint', () => {
    it('should lint a compiled document', async () => {
      const compiled = await runCompile(MFA_POLICY, { name: 'Access Control Policy' }, context());

      const result = await runLint(compiled.output, { format: 'text' });

      expect(result.success).toBe(true);
      expect(result.output).toBe('\nLinted 3 controls - no issues found');
    });

    it('should fail on lint errors', async () => {
      const yamlText = [
        'apiVersion: policy-compiler/v1',
        'kind: Assessment',
        'metadata:',
        '  name: Vendor Policy',
        '  categoryName: Vendor Policy',
        'spec:',
        '  planControls:',
        '    - alias: "1"',
        '      name: Assess Vendors',
        '      description: Vendors are assessed yearly.',
      ].join('\n');

      const result = await runLint(yamlText, { format: 'json' });

      expect(result.exitCode).toBe(1);
      expect(result.error).toBeUndefined();
      expect(JSON.parse(result.output)).toMatchObject({
        passed: false,
        issues: [{ ruleId: 'category-not-name' }],
      });
    });

    it('should report tree invariant violations as lint issues', async () => {
      const yamlText = [
        'apiVersion: policy-compiler/v1',
        'kind: Assessment',
        'metadata:',
        '  name: Access Policy',
        '  categoryName: Access Management',
        'spec:',
        '  planControls:',
        '    - alias: "1"',
        '      name: Review Access',
        '      description: Access is reviewed quarterly.',
        '    - alias: "1"',
        '      name: Rotate Keys',
        '      description: Keys are rotated yearly.',
      ].join('\n');

      const result = await runLint(yamlText, { format: 'json' });

      expect(result.exitCode).toBe(1);
      expect(result.error).toBeUndefined();
      expect(JSON.parse(result.output)).toMatchObject({
        controlsChecked: 2,
        passed: false,
        issues: [
          {
            ruleId: 'unique-sibling-alias',
            alias: '1',
            message: "Alias '1' is used by more than one sibling",
          },
          {
            ruleId: 'unique-sibling-displayable',
            alias: '1',
            message: "Displayable '1' is used by more than one sibling",
          },
        ],
      });
    });

    it('should report unreadable documents', async () => {
      const result = await runLint('kind: Nothing', { format: 'text' });

      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^INVALID_DOCUMENT: Invalid assessment document: apiVersion: /);
    });
  });

  describe('traverse', () => {
    it('should summarize the sources of a control', async () => {
      const result = await runTraverse(graphFixture, 'ctrl-orphan', {}, context());

      expect(result.output).toBe(
        [
          'Control ctrl-orphan',
          '  Level 0:',
          '    ctrl-orphan',
          'Evidence: 0  Warnings: 1',
          'Next: NO_EVIDENCE_LINKED',
        ].join('\n')
      );
    });

    it('should output JSON with warnings', async () => {
      const result = await runTraverse(graphFixture, 'ctrl-hr', { json: true, maxDepth: 1 }, context());

      expect(JSON.parse(result.output)).toMatchObject({
        startId: 'ctrl-hr',
        evidenceCount: 2,
        truncated: false,
        nextAction: 'SAMPLE_EVIDENCE',
        warnings: [],
      });
    });

    it('should fail for unknown controls', async () => {
      const result = await runTraverse(graphFixture, 'ctrl-missing', {}, context());

      expect(result.success).toBe(false);
      expect(result.error).toBe('Control not found in graph: ctrl-missing');
    });
  });

  describe('synthesize', () => {
    it('should print both queries', async () => {
      const result = await runSynthesize(
        graphFixture,
        'ctrl-devices',
        {
          control: { filters: { status: 'active' } },
          assessment: {},
        },
        context()
      );

      expect(result.exitCode).toBe(0);
      expect(result.output).toBe(
        [
          '-- plan: SINGLE',
          '',
          '-- selection',
          'SELECT "device_id", "employee_id", "status", "encrypted"',
          'FROM "Devices"',
          `WHERE "status" = 'active'`,
          '',
          '-- summary failed: MISSING_COMPLIANCE_CHECK: The compliance summary needs a compliance check',
        ].join('\n')
      );
    });

    it('should fail when no query can be built', async () => {
      const result = await runSynthesize(
        graphFixture,
        'ctrl-orphan',
        { control: {}, assessment: {} },
        context()
      );

      expect(result.exitCode).toBe(1);
      expect(result.output).toBe(
        [
          '-- plan: NONE',
          '',
          '-- selection failed: NO_EVIDENCE: No evidence schemas to synthesize from',
          '',
          '-- summary failed: NO_EVIDENCE: No evidence schemas to synthesize from',
        ].join('\n')
      );
    });

    it('should synthesize per evidence as JSON', async () => {
      const result = await runSynthesize(
        graphFixture,
        'ctrl-hr',
        { control: {}, assessment: {}, perEvidence: true, json: true },
        context()
      );

      expect(result.success).toBe(true);
      expect(JSON.parse(result.output)).toMatchObject([
        {
          evidence: 'Employees',
          plan: 'SINGLE',
          selection: { ok: true, sql: 'SELECT "employee_id", "department", "status"\nFROM "Employees"' },
          summary: { ok: false, code: 'MISSING_COMPLIANCE_CHECK' },
        },
        {
          evidence: 'Devices',
          plan: 'SINGLE',
          selection: { ok: true, tables: ['Devices'] },
        },
      ]);
    });
  });
});
