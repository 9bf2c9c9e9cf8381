/**
 * Assessment Linter for Policy Compiler
 *
 * Checks a compiled or hand-edited Assessment before it is published:
 * tree invariants, naming, and example text that leaked into a control.
 * Output is available as text, JSON, or SARIF for CI annotations.
 */

import { containsExampleMarker } from '../src/extraction/markers.js';
import type { TreeIssue } from '../src/hierarchy/aliases.js';
import { collectTreeIssues, walkControls } from '../src/hierarchy/aliases.js';
import type { Assessment, Control } from '../src/hierarchy/types.js';
import { VERSION } from '../src/index.js';

/**
 * Lint rule severity
 */
export const LintSeverity = {
  /** Error - must fix */
  ERROR: 'error',
  /** Warning - should fix */
  WARNING: 'warning',
  /** Info - consider fixing */
  INFO: 'info',
} as const;

export type LintSeverityValue = (typeof LintSeverity)[keyof typeof LintSeverity];

export interface LintRule {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly severity: LintSeverityValue;
  readonly category: 'structure' | 'naming' | 'content';
  readonly check: (assessment: Assessment) => LintIssue[];
}

export interface LintIssue {
  readonly ruleId: string;
  readonly severity: LintSeverityValue;
  /** Alias of the offending control; absent for assessment-level issues */
  readonly alias?: string;
  readonly message: string;
  readonly suggestion?: string;
}

export interface LintResult {
  readonly assessment: string;
  readonly controlsChecked: number;
  readonly totalIssues: number;
  readonly bySeverity: {
    readonly errors: number;
    readonly warnings: number;
    readonly infos: number;
  };
  readonly issues: readonly LintIssue[];
  /** No errors */
  readonly passed: boolean;
  readonly summary: string;
}

export interface LintConfig {
  /** Disable a rule with false or override its severity */
  readonly rules: Record<string, boolean | LintSeverityValue>;
  readonly warningsAsErrors?: boolean;
  /** Aliases (or alias prefixes ending in ".") to skip */
  readonly ignore?: readonly string[];
}

function treeRule(
  id: string,
  name: string,
  description: string,
  kinds: readonly TreeIssue['rule'][],
  suggestion: string
): LintRule {
  return {
    id,
    name,
    description,
    severity: LintSeverity.ERROR,
    category: 'structure',
    check: (assessment) =>
      collectTreeIssues(assessment.planControls)
        .filter((issue) => kinds.includes(issue.rule))
        .map((issue) => ({
          ruleId: id,
          severity: LintSeverity.ERROR,
          alias: issue.alias,
          message: issue.message,
          suggestion,
        })),
  };
}

function controlRule(
  id: string,
  name: string,
  description: string,
  severity: LintSeverityValue,
  category: LintRule['category'],
  test: (control: Control) => { message: string; suggestion?: string } | null
): LintRule {
  return {
    id,
    name,
    description,
    severity,
    category,
    check: (assessment) => {
      const issues: LintIssue[] = [];
      walkControls(assessment.planControls, (control) => {
        const found = test(control);
        if (found) {
          issues.push({ ruleId: id, severity, alias: control.alias, ...found });
        }
      });
      return issues;
    },
  };
}

export const DEFAULT_LINT_RULES: readonly LintRule[] = [
  // Structure rules
  treeRule(
    'alias-prefix',
    'Alias Prefix',
    "A child's alias extends its parent's alias by one numeric segment",
    ['alias-format', 'alias-prefix'],
    'Re-run alias assignment instead of editing aliases by hand'
  ),
  treeRule(
    'unique-sibling-alias',
    'Unique Sibling Alias',
    'Sibling controls have distinct aliases',
    ['unique-sibling-alias'],
    'Re-run alias assignment instead of editing aliases by hand'
  ),
  treeRule(
    'unique-sibling-displayable',
    'Unique Sibling Label',
    'Sibling controls have distinct displayable labels',
    ['unique-sibling-displayable'],
    'Rename one of the labels or reset it to the alias'
  ),
  treeRule(
    'leaf-consistency',
    'Leaf Consistency',
    'A control is a leaf exactly when it has no children',
    ['leaf-consistency'],
    'Fix isLeaf to match the children'
  ),

  // Naming rules
  {
    id: 'non-empty-name',
    name: 'Non-Empty Name',
    description: 'The assessment and every control have a name',
    severity: LintSeverity.ERROR,
    category: 'naming',
    check: (assessment) => {
      const issues: LintIssue[] = [];
      if (assessment.name.trim() === '') {
        issues.push({
          ruleId: 'non-empty-name',
          severity: LintSeverity.ERROR,
          message: 'Assessment name is empty',
          suggestion: 'Name the assessment after the policy document',
        });
      }
      walkControls(assessment.planControls, (control) => {
        if (control.name.trim() === '') {
          issues.push({
            ruleId: 'non-empty-name',
            severity: LintSeverity.ERROR,
            alias: control.alias,
            message: `Control ${control.alias} has no name`,
            suggestion: 'Give the control a short descriptive name',
          });
        }
      });
      return issues;
    },
  },
  {
    id: 'category-not-name',
    name: 'Category Is Not Name',
    description: 'The category is reusable and does not restate the assessment name',
    severity: LintSeverity.ERROR,
    category: 'naming',
    check: (assessment) => {
      const category = assessment.categoryName.trim();
      if (category === '') {
        return [
          {
            ruleId: 'category-not-name',
            severity: LintSeverity.ERROR,
            message: 'Assessment has no category',
            suggestion: 'Choose a category shared by related assessments',
          },
        ];
      }
      if (category.toLowerCase() === assessment.name.trim().toLowerCase()) {
        return [
          {
            ruleId: 'category-not-name',
            severity: LintSeverity.ERROR,
            message: `Category "${category}" restates the assessment name`,
            suggestion: 'Choose a category shared by related assessments',
          },
        ];
      }
      return [];
    },
  },

  // Content rules
  controlRule(
    'example-in-description',
    'No Examples In Controls',
    'Example text from the policy is not part of a requirement',
    LintSeverity.WARNING,
    'content',
    (control) =>
      containsExampleMarker(control.description) || containsExampleMarker(control.name)
        ? {
            message: `Control ${control.alias} contains example text`,
            suggestion: 'Remove the illustrative clause; examples are not requirements',
          }
        : null
  ),
  controlRule(
    'empty-description',
    'Description Recommended',
    'Controls should have a description',
    LintSeverity.INFO,
    'content',
    (control) =>
      control.description.trim() === ''
        ? {
            message: `Control ${control.alias} has no description`,
            suggestion: 'Describe what the control requires',
          }
        : null
  ),
];

/**
 * Assessment Linter
 */
export class AssessmentLinter {
  private rules: Map<string, LintRule> = new Map();
  private config: LintConfig;

  constructor(config: LintConfig = { rules: {} }) {
    this.config = config;

    for (const rule of DEFAULT_LINT_RULES) {
      this.registerRule(rule);
    }
  }

  /**
   * Register a custom lint rule
   */
  registerRule(rule: LintRule): void {
    this.rules.set(rule.id, rule);
  }

  lint(assessment: Assessment): LintResult {
    const issues: LintIssue[] = [];

    for (const [ruleId, rule] of this.rules) {
      const setting = this.config.rules[ruleId];
      if (setting === false) {
        continue;
      }

      for (const issue of rule.check(assessment)) {
        if (this.isIgnored(issue)) {
          continue;
        }
        let severity = typeof setting === 'string' ? setting : issue.severity;
        if (this.config.warningsAsErrors && severity === LintSeverity.WARNING) {
          severity = LintSeverity.ERROR;
        }
        issues.push({ ...issue, severity });
      }
    }

    let controlsChecked = 0;
    walkControls(assessment.planControls, () => {
      controlsChecked += 1;
    });

    const errors = issues.filter((i) => i.severity === LintSeverity.ERROR).length;
    const warnings = issues.filter((i) => i.severity === LintSeverity.WARNING).length;
    const infos = issues.filter((i) => i.severity === LintSeverity.INFO).length;

    const summary =
      issues.length === 0
        ? `Linted ${controlsChecked} controls - no issues found`
        : `Linted ${controlsChecked} controls - found ${errors} error(s), ${warnings} warning(s), ${infos} info(s)`;

    return {
      assessment: assessment.name,
      controlsChecked,
      totalIssues: issues.length,
      bySeverity: { errors, warnings, infos },
      issues,
      passed: errors === 0,
      summary,
    };
  }

  /**
   * Format lint result for console output
   */
  formatResult(result: LintResult, verbose: boolean = false): string {
    const lines: string[] = [];

    if (result.issues.length > 0) {
      const byControl = new Map<string, LintIssue[]>();
      for (const issue of result.issues) {
        const key = issue.alias ?? '<assessment>';
        const existing = byControl.get(key) ?? [];
        existing.push(issue);
        byControl.set(key, existing);
      }

      for (const [key, issues] of byControl) {
        lines.push(`\n${key}`);
        for (const issue of issues) {
          const icon = issue.severity === 'error' ? '✖' : issue.severity === 'warning' ? '⚠' : 'ℹ';
          lines.push(`  ${icon} ${issue.message} (${issue.ruleId})`);
          if (verbose && issue.suggestion) {
            lines.push(`    → ${issue.suggestion}`);
          }
        }
      }
    }

    lines.push('');
    lines.push(result.summary);

    if (!result.passed) {
      lines.push('');
      lines.push('Linting failed. Please fix the errors above.');
    }

    return lines.join('\n');
  }

  formatResultJSON(result: LintResult): string {
    return JSON.stringify(result, null, 2);
  }

  /**
   * Format result as SARIF for code-scanning integrations
   */
  formatResultSARIF(result: LintResult, uri: string = 'assessment.yaml'): string {
    const level = (severity: LintSeverityValue): 'error' | 'warning' | 'note' =>
      severity === 'error' ? 'error' : severity === 'warning' ? 'warning' : 'note';

    const sarif = {
      $schema:
        'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/master/Schemata/sarif-schema-2.1.0.json',
      version: '2.1.0',
      runs: [
        {
          tool: {
            driver: {
              name: 'Policy Compiler Assessment Linter',
              version: VERSION,
              rules: Array.from(this.rules.values()).map((rule) => ({
                id: rule.id,
                name: rule.name,
                shortDescription: { text: rule.description },
                defaultConfiguration: { level: level(rule.severity) },
              })),
            },
          },
          results: result.issues.map((issue) => ({
            ruleId: issue.ruleId,
            level: level(issue.severity),
            message: { text: issue.message },
            locations: [
              {
                physicalLocation: { artifactLocation: { uri } },
                logicalLocations: [
                  { fullyQualifiedName: issue.alias ?? result.assessment, kind: 'object' },
                ],
              },
            ],
          })),
        },
      ],
    };

    return JSON.stringify(sarif, null, 2);
  }

  private isIgnored(issue: LintIssue): boolean {
    const { ignore } = this.config;
    if (!ignore || issue.alias === undefined) {
      return false;
    }
    const alias = issue.alias;
    return ignore.some((pattern) =>
      pattern.endsWith('.') ? alias.startsWith(pattern) : alias === pattern
    );
  }
}

/**
 * Create an assessment linter
 */
export function createAssessmentLinter(config?: LintConfig): AssessmentLinter {
  return new AssessmentLinter(config);
}
