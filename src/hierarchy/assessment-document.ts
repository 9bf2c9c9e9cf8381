/**
 * Persisted Assessment document.
 *
 * An Assessment is stored as YAML:
 *
 *   apiVersion: policy-compiler/v1
 *   kind: Assessment
 *   metadata: { name, description, categoryName }
 *   spec:
 *     planControls: [{ alias, displayable, name, description, isLeaf, rule?, planControls? }]
 *
 * Parsing validates shape with zod and then re-checks the alias invariants,
 * so a hand-edited document cannot smuggle in a broken tree.
 */

import yaml from 'js-yaml';
import { z } from 'zod';
import { AssessmentDocumentError } from '../core/errors.js';
import type { Fingerprint } from '../core/identity/fingerprint.js';
import { computeFingerprint } from '../core/identity/fingerprint.js';
import { collectTreeIssues } from './aliases.js';
import type { Assessment, AttachedRule, Control } from './types.js';

export const API_VERSION = 'policy-compiler/v1';
export const DOCUMENT_KIND = 'Assessment';

const RuleSchema = z.object({
  name: z.string().min(1),
  lastEvaluation: z.enum(['COMPLIANT', 'NON_COMPLIANT']).optional(),
});

interface ControlDocument {
  alias: string;
  displayable?: string | undefined;
  name: string;
  description?: string | undefined;
  isLeaf?: boolean | undefined;
  rule?: z.infer<typeof RuleSchema> | undefined;
  planControls?: ControlDocument[] | undefined;
}

const ControlSchema: z.ZodType<ControlDocument> = z.lazy(() =>
  z.object({
    alias: z.coerce.string().min(1),
    displayable: z.coerce.string().optional(),
    name: z.string().min(1),
    description: z.string().optional(),
    isLeaf: z.boolean().optional(),
    rule: RuleSchema.optional(),
    planControls: z.array(ControlSchema).optional(),
  })
);

const DocumentSchema = z.object({
  apiVersion: z.literal(API_VERSION),
  kind: z.literal(DOCUMENT_KIND),
  metadata: z.object({
    name: z.string().trim().min(1, 'metadata.name is required'),
    description: z.string().default(''),
    categoryName: z.string().trim().min(1, 'metadata.categoryName is required'),
  }),
  spec: z.object({
    planControls: z.array(ControlSchema).default([]),
  }),
});

export type AssessmentDocument = z.infer<typeof DocumentSchema>;

function toControlDocument(control: Control): ControlDocument {
  const doc: ControlDocument = {
    alias: control.alias,
    displayable: control.displayable,
    name: control.name,
    description: control.description,
    isLeaf: control.isLeaf,
  };
  if (control.rule) {
    doc.rule = { ...control.rule };
  }
  if (control.planControls.length > 0) {
    doc.planControls = control.planControls.map(toControlDocument);
  }
  return doc;
}

function fromControlDocument(doc: ControlDocument): Control {
  const children = (doc.planControls ?? []).map(fromControlDocument);
  const control: Control = {
    alias: doc.alias,
    displayable: doc.displayable ?? doc.alias,
    name: doc.name,
    description: doc.description ?? '',
    isLeaf: doc.isLeaf ?? children.length === 0,
    planControls: children,
  };
  if (doc.rule) {
    const rule: AttachedRule =
      doc.rule.lastEvaluation !== undefined
        ? { name: doc.rule.name, lastEvaluation: doc.rule.lastEvaluation }
        : { name: doc.rule.name };
    return { ...control, rule };
  }
  return control;
}

export function toAssessmentDocument(assessment: Assessment): AssessmentDocument {
  return {
    apiVersion: API_VERSION,
    kind: DOCUMENT_KIND,
    metadata: {
      name: assessment.name,
      description: assessment.description,
      categoryName: assessment.categoryName,
    },
    spec: {
      planControls: assessment.planControls.map(toControlDocument),
    },
  };
}

export interface ParseOptions {
  /**
   * Reject documents whose control tree breaks an alias or leaf invariant
   * (default: true). The linter turns this off to report them itself.
   */
  readonly verify?: boolean;
}

/**
 * Validate a plain object as an Assessment document.
 *
 * @throws AssessmentDocumentError listing every issue found
 */
export function fromAssessmentDocument(input: unknown, options: ParseOptions = {}): Assessment {
  const parsed = DocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new AssessmentDocumentError(
      parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
    );
  }

  const { metadata, spec } = parsed.data;
  const assessment: Assessment = {
    name: metadata.name,
    description: metadata.description,
    categoryName: metadata.categoryName,
    planControls: spec.planControls.map(fromControlDocument),
  };

  if (options.verify === false) {
    return assessment;
  }

  const issues = collectTreeIssues(assessment.planControls).map(
    (issue) => `${issue.rule}: ${issue.message}`
  );
  if (issues.length > 0) {
    throw new AssessmentDocumentError(issues);
  }

  return assessment;
}

export function serializeAssessment(assessment: Assessment): string {
  return yaml.dump(toAssessmentDocument(assessment), {
    noRefs: true,
    lineWidth: 100,
    quotingType: '"',
  });
}

/**
 * Parse a YAML Assessment document
 */
export function parseAssessment(text: string, options: ParseOptions = {}): Assessment {
  let loaded: unknown;
  try {
    loaded = yaml.load(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new AssessmentDocumentError([`yaml: ${reason}`]);
  }
  return fromAssessmentDocument(loaded, options);
}

/**
 * Version fingerprint of an Assessment's content
 */
export function assessmentFingerprint(assessment: Assessment): Fingerprint {
  return computeFingerprint(toAssessmentDocument(assessment));
}
