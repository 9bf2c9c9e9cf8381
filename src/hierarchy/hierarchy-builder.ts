/**
 * Hierarchy Builder for Policy Compiler
 *
 * Assembles extracted requirements into an Assessment tree:
 * - requirements sharing a theme (or a human grouping hint) are placed under
 *   a synthesized parent control
 * - requirements with no natural grouping become top-level leaves
 * - aliases are assigned depth-first and verified before the tree is returned
 *
 * When a requirement matches several themes, it joins the earliest-created
 * group (document order) among them; if none exists yet, a group is opened
 * for its first matching theme in catalog order.
 */

import { ErrorCode, ExtractionEmptyError, PolicyCompilerError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import type { Requirement } from '../extraction/requirement-extractor.js';
import { OBLIGATION_RE } from '../extraction/markers.js';
import { assignAliases, verifyAliasInvariants } from './aliases.js';
import type { Theme } from './themes.js';
import { DEFAULT_THEMES, matchThemes } from './themes.js';
import type { Assessment, ControlInput } from './types.js';

export const FALLBACK_CATEGORY = 'General Governance';

const MAX_NAME_WORDS = 8;

const MINOR_WORDS: ReadonlySet<string> = new Set([
  'a',
  'an',
  'the',
  'and',
  'or',
  'for',
  'of',
  'to',
  'in',
  'on',
  'at',
  'by',
  'with',
  'from',
  'across',
  'within',
]);

/**
 * A human-assigned group of requirements
 */
export interface GroupingHint {
  readonly name: string;
  readonly description?: string;
  /** Requirement ids (see Requirement.id) */
  readonly requirementIds: readonly string[];
}

export interface BuildOptions {
  readonly name: string;
  readonly description?: string;
  /** Explicit category; derived from themes when omitted */
  readonly categoryName?: string;
  readonly groupingHints?: readonly GroupingHint[];
  readonly themes?: readonly Theme[];
  readonly logger?: Logger;
}

interface RequirementGroup {
  readonly theme?: Theme;
  readonly hint?: GroupingHint;
  readonly members: Requirement[];
}

/**
 * Derive a short control name from a requirement statement
 */
export function deriveControlName(statement: string): string {
  const body = statement.replace(/[.;:!?]+$/, '');
  const modal = OBLIGATION_RE.exec(body);
  const predicate = modal ? body.slice(modal.index + modal[0].length) : body;

  const words = predicate
    .trim()
    .split(/\s+/)
    .filter((w) => w.length > 0)
    .slice(0, MAX_NAME_WORDS);

  return words
    .map((word, index) => {
      if (word !== word.toLowerCase()) {
        return word;
      }
      if (index > 0 && MINOR_WORDS.has(word)) {
        return word;
      }
      return word.charAt(0).toUpperCase() + word.slice(1);
    })
    .join(' ');
}

/**
 * Hierarchy Builder
 */
export class HierarchyBuilder {
  private readonly themes: readonly Theme[];
  private readonly logger: Logger;

  constructor(options: { themes?: readonly Theme[]; logger?: Logger } = {}) {
    this.themes = options.themes ?? DEFAULT_THEMES;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Build an Assessment from requirements in document order.
   *
   * @throws ExtractionEmptyError when there are no requirements
   * @throws AliasCollisionError when the resulting tree violates alias invariants
   */
  build(requirements: readonly Requirement[], options: BuildOptions): Assessment {
    if (requirements.length === 0) {
      throw new ExtractionEmptyError({ assessment: options.name });
    }
    const name = options.name.trim();
    if (name.length === 0) {
      throw new PolicyCompilerError(ErrorCode.INVALID_INPUT, 'Assessment name is required');
    }

    const themes = options.themes ?? this.themes;
    const groups = this.group(requirements, options.groupingHints ?? [], themes);
    const roots = groups.map((group) => this.toControlInput(group));

    const assessment: Assessment = {
      name,
      description: options.description?.trim() ?? '',
      categoryName: this.resolveCategory(name, groups, options.categoryName),
      planControls: assignAliases(roots),
    };

    verifyAliasInvariants(assessment);

    this.logger.info('assessment built', {
      name: assessment.name,
      categoryName: assessment.categoryName,
      roots: assessment.planControls.length,
      requirements: requirements.length,
    });

    return assessment;
  }

  private group(
    requirements: readonly Requirement[],
    hints: readonly GroupingHint[],
    themes: readonly Theme[]
  ): RequirementGroup[] {
    const groups: RequirementGroup[] = [];
    const hintGroups = new Map<GroupingHint, RequirementGroup>();
    const hintFor = new Map<string, GroupingHint>();

    for (const hint of hints) {
      for (const id of hint.requirementIds) {
        if (!hintFor.has(id)) {
          hintFor.set(id, hint);
        }
      }
    }

    for (const requirement of requirements) {
      const hint = hintFor.get(requirement.id);
      if (hint) {
        let group = hintGroups.get(hint);
        if (!group) {
          group = { hint, members: [] };
          hintGroups.set(hint, group);
          groups.push(group);
        }
        group.members.push(requirement);
        continue;
      }

      const matches = matchThemes(requirement.statement, themes);
      const existing = groups.find(
        (group) => group.theme !== undefined && matches.includes(group.theme)
      );
      if (existing) {
        existing.members.push(requirement);
        continue;
      }

      const [firstMatch] = matches;
      groups.push(
        firstMatch !== undefined
          ? { theme: firstMatch, members: [requirement] }
          : { members: [requirement] }
      );
    }

    return groups;
  }

  private toControlInput(group: RequirementGroup): ControlInput {
    const leaves = group.members.map(
      (requirement): ControlInput => ({
        name: deriveControlName(requirement.statement),
        description: requirement.statement,
      })
    );

    const [onlyLeaf] = leaves;
    if (group.hint === undefined && leaves.length === 1 && onlyLeaf !== undefined) {
      return onlyLeaf;
    }

    const name = group.hint?.name ?? group.theme?.name ?? 'Requirements';
    const description =
      group.hint?.description ?? group.theme?.description ?? `Requirements grouped under ${name}.`;

    return { name, description, planControls: leaves };
  }

  private resolveCategory(
    assessmentName: string,
    groups: readonly RequirementGroup[],
    explicit: string | undefined
  ): string {
    const restates = (category: string): boolean =>
      category.trim().toLowerCase() === assessmentName.toLowerCase();

    if (explicit !== undefined && explicit.trim().length > 0) {
      if (restates(explicit)) {
        throw new PolicyCompilerError(
          ErrorCode.INVALID_INPUT,
          `categoryName '${explicit}' restates the assessment name; choose a reusable category`
        );
      }
      return explicit.trim();
    }

    const counts = new Map<string, number>();
    for (const group of groups) {
      if (group.theme) {
        counts.set(
          group.theme.category,
          (counts.get(group.theme.category) ?? 0) + group.members.length
        );
      }
    }

    let best: string | undefined;
    let bestCount = 0;
    for (const [category, count] of counts) {
      if (count > bestCount) {
        best = category;
        bestCount = count;
      }
    }

    if (best === undefined || restates(best)) {
      return FALLBACK_CATEGORY;
    }
    return best;
  }
}

/**
 * Create a hierarchy builder
 */
export function createHierarchyBuilder(options?: {
  themes?: readonly Theme[];
  logger?: Logger;
}): HierarchyBuilder {
  return new HierarchyBuilder(options);
}

/**
 * Build an Assessment with the default theme catalog
 */
export function buildAssessment(
  requirements: readonly Requirement[],
  options: BuildOptions
): Assessment {
  return new HierarchyBuilder(options.logger ? { logger: options.logger } : {}).build(
    requirements,
    options
  );
}
