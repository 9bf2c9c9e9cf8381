import { describe, it, expect } from '@jest/globals';
import { AssessmentDocumentError, ErrorCode } from '../../src/core/errors.js';
import { assignAliases } from '../../src/hierarchy/aliases.js';
import {
  API_VERSION,
  assessmentFingerprint,
  fromAssessmentDocument,
  parseAssessment,
  serializeAssessment,
  toAssessmentDocument,
} from '../../src/hierarchy/assessment-document.js';
import type { Assessment } from '../../src/hierarchy/types.js';

const assessment: Assessment = {
  name: 'Access Control Policy',
  description: 'Who may access what.',
  categoryName: 'Access Management',
  planControls: assignAliases([
    {
      name: 'MFA Enforcement',
      description: 'Multi-factor authentication requirements.',
      planControls: [
        {
          name: 'Enforce MFA for All Remote Access',
          description: 'The organization must enforce MFA for all remote access.',
          rule: { name: 'mfa_remote', lastEvaluation: 'COMPLIANT' },
        },
      ],
    },
  ]),
};

const HAND_WRITTEN = `apiVersion: policy-compiler/v1
kind: Assessment
metadata:
  name: Access Policy
  categoryName: Access Management
spec:
  planControls:
    - alias: 1
      name: MFA Enforcement
      planControls:
        - alias: 1.1
          name: Enforce MFA
          rule:
            name: mfa_rule
            lastEvaluation: NON_COMPLIANT
`;

describe('Assessment Document', () => {
  it('should wrap the assessment in a versioned document', () => {
    const doc = toAssessmentDocument(assessment);

    expect(doc.apiVersion).toBe(API_VERSION);
    expect(doc.kind).toBe('Assessment');
    expect(doc.metadata).toEqual({
      name: 'Access Control Policy',
      description: 'Who may access what.',
      categoryName: 'Access Management',
    });
    expect(doc.spec.planControls[0]?.planControls?.[0]?.rule).toEqual({
      name: 'mfa_remote',
      lastEvaluation: 'COMPLIANT',
    });
  });

  it('should serialize to YAML that parses back to the same assessment', () => {
    const text = serializeAssessment(assessment);

    expect(text.split('\n')[0]).toBe('apiVersion: policy-compiler/v1');
    expect(parseAssessment(text)).toEqual(assessment);
  });

  it('should fill defaults when reading a hand-written document', () => {
    const parsed = parseAssessment(HAND_WRITTEN);

    expect(parsed.description).toBe('');
    expect(parsed.planControls).toEqual([
      {
        alias: '1',
        displayable: '1',
        name: 'MFA Enforcement',
        description: '',
        isLeaf: false,
        planControls: [
          {
            alias: '1.1',
            displayable: '1.1',
            name: 'Enforce MFA',
            description: '',
            isLeaf: true,
            planControls: [],
            rule: { name: 'mfa_rule', lastEvaluation: 'NON_COMPLIANT' },
          },
        ],
      },
    ]);
  });

  it('should reject a blank category', () => {
    const text = HAND_WRITTEN.replace('categoryName: Access Management', 'categoryName: "  "');

    expect(() => parseAssessment(text)).toThrow(
      expect.objectContaining({
        code: ErrorCode.INVALID_DOCUMENT,
        issues: ['metadata.categoryName: metadata.categoryName is required'],
      })
    );
  });

  it('should reject a document of another kind', () => {
    expect(() =>
      fromAssessmentDocument({
        apiVersion: API_VERSION,
        kind: 'Policy',
        metadata: { name: 'x', categoryName: 'y' },
        spec: {},
      })
    ).toThrow(AssessmentDocumentError);
  });

  it('should re-check tree invariants', () => {
    const input = {
      apiVersion: API_VERSION,
      kind: 'Assessment',
      metadata: { name: 'Dup', categoryName: 'Misc' },
      spec: {
        planControls: [
          { alias: '1', name: 'A' },
          { alias: '1', name: 'B' },
        ],
      },
    };

    expect(() => fromAssessmentDocument(input)).toThrow(
      expect.objectContaining({
        issues: [
          "unique-sibling-alias: Alias '1' is used by more than one sibling",
          "unique-sibling-displayable: Displayable '1' is used by more than one sibling",
        ],
      })
    );
  });

  it('should skip the tree check when verification is off', () => {
    const input = {
      apiVersion: API_VERSION,
      kind: 'Assessment',
      metadata: { name: 'Dup', categoryName: 'Misc' },
      spec: {
        planControls: [
          { alias: '1', name: 'A' },
          { alias: '1', name: 'B' },
        ],
      },
    };

    const assessment = fromAssessmentDocument(input, { verify: false });

    expect(assessment.planControls.map((c) => [c.alias, c.name])).toEqual([
      ['1', 'A'],
      ['1', 'B'],
    ]);
  });

  it('should report YAML syntax errors as document errors', () => {
    expect(() => parseAssessment('metadata: [unclosed')).toThrow(
      /^Invalid assessment document: yaml: /
    );
  });

  it('should fingerprint the content', () => {
    const renamed: Assessment = { ...assessment, name: 'Renamed Policy' };

    expect(assessmentFingerprint(assessment)).toBe(assessmentFingerprint({ ...assessment }));
    expect(assessmentFingerprint(renamed)).not.toBe(assessmentFingerprint(assessment));
    expect(assessmentFingerprint(assessment)).toMatch(/^sha256:/);
  });
});
