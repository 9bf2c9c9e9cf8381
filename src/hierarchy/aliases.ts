/**
 * Alias assignment and tree invariants.
 *
 * Aliases are always rebuilt from scratch in one depth-first pass; there is
 * no incremental patching after a reorder.
 */

import { AliasCollisionError, ErrorCode, PolicyCompilerError } from '../core/errors.js';
import type {
  Assessment,
  Control,
  ControlInput,
  LeafControlSummary,
} from './types.js';

const ALIAS_RE = /^[1-9]\d*(?:\.[1-9]\d*)*$/;

export function childAlias(parentAlias: string, index: number): string {
  return parentAlias ? `${parentAlias}.${index + 1}` : String(index + 1);
}

/**
 * Assign aliases depth-first, left-to-right, 1-based per sibling group.
 *
 * @throws AliasCollisionError if two siblings end up with the same label
 */
export function assignAliases(
  controls: readonly ControlInput[],
  parentAlias = ''
): Control[] {
  const result = controls.map((input, index): Control => {
    const alias = childAlias(parentAlias, index);
    const keepsLabel =
      input.displayable !== undefined &&
      input.displayable.trim() !== '' &&
      input.displayable !== input.alias;
    const children = assignAliases(input.planControls ?? [], alias);

    const control: Control = {
      alias,
      displayable: keepsLabel && input.displayable !== undefined ? input.displayable : alias,
      name: input.name,
      description: input.description,
      isLeaf: children.length === 0,
      planControls: children,
    };
    return input.rule !== undefined ? { ...control, rule: input.rule } : control;
  });

  assertUniqueSiblings(result, parentAlias);
  return result;
}

function assertUniqueSiblings(siblings: readonly Control[], parentAlias: string): void {
  const aliases = new Set<string>();
  const labels = new Set<string>();

  for (const control of siblings) {
    if (aliases.has(control.alias)) {
      throw new AliasCollisionError(
        control.alias,
        `Duplicate alias '${control.alias}' under '${parentAlias || '<root>'}'`
      );
    }
    if (labels.has(control.displayable)) {
      throw new AliasCollisionError(
        control.alias,
        `Displayable '${control.displayable}' collides with a sibling under '${parentAlias || '<root>'}'`,
        { displayable: control.displayable }
      );
    }
    aliases.add(control.alias);
    labels.add(control.displayable);
  }
}

/**
 * A structural problem in a control tree
 */
export interface TreeIssue {
  readonly rule:
    | 'alias-format'
    | 'alias-prefix'
    | 'unique-sibling-alias'
    | 'unique-sibling-displayable'
    | 'leaf-consistency';
  readonly alias: string;
  readonly message: string;
}

/**
 * Check every alias/leaf invariant without throwing
 */
export function collectTreeIssues(controls: readonly Control[], parentAlias = ''): TreeIssue[] {
  const issues: TreeIssue[] = [];
  const aliases = new Set<string>();
  const labels = new Set<string>();

  for (const control of controls) {
    if (!ALIAS_RE.test(control.alias)) {
      issues.push({
        rule: 'alias-format',
        alias: control.alias,
        message: `Alias '${control.alias}' is not a dotted numeric path`,
      });
    } else {
      const expectedDepth = parentAlias ? parentAlias.split('.').length + 1 : 1;
      const extendsParent = parentAlias ? control.alias.startsWith(`${parentAlias}.`) : true;
      if (!extendsParent || control.alias.split('.').length !== expectedDepth) {
        issues.push({
          rule: 'alias-prefix',
          alias: control.alias,
          message: `Alias '${control.alias}' does not extend parent alias '${parentAlias || '<root>'}' by one segment`,
        });
      }
    }

    if (aliases.has(control.alias)) {
      issues.push({
        rule: 'unique-sibling-alias',
        alias: control.alias,
        message: `Alias '${control.alias}' is used by more than one sibling`,
      });
    }
    aliases.add(control.alias);

    if (labels.has(control.displayable)) {
      issues.push({
        rule: 'unique-sibling-displayable',
        alias: control.alias,
        message: `Displayable '${control.displayable}' is used by more than one sibling`,
      });
    }
    labels.add(control.displayable);

    const hasChildren = control.planControls.length > 0;
    if (control.isLeaf === hasChildren) {
      issues.push({
        rule: 'leaf-consistency',
        alias: control.alias,
        message: control.isLeaf
          ? `Control '${control.alias}' is marked as a leaf but has ${control.planControls.length} children`
          : `Control '${control.alias}' is marked as a parent but has no children`,
      });
    }

    issues.push(...collectTreeIssues(control.planControls, control.alias));
  }

  return issues;
}

/**
 * Verify alias invariants of an assessment.
 *
 * @throws AliasCollisionError on the first violation
 */
export function verifyAliasInvariants(assessment: Assessment): void {
  const [first] = collectTreeIssues(assessment.planControls);
  if (first) {
    throw new AliasCollisionError(first.alias, first.message, { rule: first.rule });
  }
}

/**
 * Depth-first walk; the callback receives the ancestors root first
 */
export function walkControls(
  controls: readonly Control[],
  visit: (control: Control, ancestors: readonly Control[]) => void,
  ancestors: readonly Control[] = []
): void {
  for (const control of controls) {
    visit(control, ancestors);
    walkControls(control.planControls, visit, [...ancestors, control]);
  }
}

export function findControl(assessment: Assessment, alias: string): Control | undefined {
  let found: Control | undefined;
  walkControls(assessment.planControls, (control) => {
    if (found === undefined && control.alias === alias) {
      found = control;
    }
  });
  return found;
}

/**
 * Every leaf control in depth-first order
 */
export function listLeafControls(assessment: Assessment): LeafControlSummary[] {
  const leaves: LeafControlSummary[] = [];
  walkControls(assessment.planControls, (control, ancestors) => {
    if (!control.isLeaf) {
      return;
    }
    const summary: LeafControlSummary = {
      alias: control.alias,
      displayable: control.displayable,
      name: control.name,
      path: ancestors.map((a) => a.name),
    };
    leaves.push(control.rule !== undefined ? { ...summary, rule: control.rule } : summary);
  });
  return leaves;
}

function toInput(control: Control): ControlInput {
  const input: ControlInput = {
    alias: control.alias,
    displayable: control.displayable,
    name: control.name,
    description: control.description,
    planControls: control.planControls.map(toInput),
  };
  return control.rule !== undefined ? { ...input, rule: control.rule } : input;
}

function permute<T>(items: readonly T[], order: readonly number[]): T[] {
  const sorted = [...order].sort((a, b) => a - b);
  const isPermutation =
    order.length === items.length && sorted.every((value, index) => value === index);
  if (!isPermutation) {
    throw new PolicyCompilerError(
      ErrorCode.INVALID_INPUT,
      `Order [${order.join(', ')}] is not a permutation of ${items.length} children`
    );
  }
  return order.map((index) => {
    const item = items[index];
    if (item === undefined) {
      throw new PolicyCompilerError(ErrorCode.INVALID_INPUT, `No child at position ${index}`);
    }
    return item;
  });
}

/**
 * Reorder the children of a control (or the roots when parentAlias is null).
 *
 * `order` lists the current 0-based positions in their new order. Every
 * alias in the tree is rebuilt afterwards.
 */
export function reorderControls(
  assessment: Assessment,
  parentAlias: string | null,
  order: readonly number[]
): Assessment {
  const roots = assessment.planControls.map(toInput);

  const reorderIn = (inputs: readonly ControlInput[]): ControlInput[] =>
    inputs.map((input) => {
      if (input.alias === parentAlias) {
        return { ...input, planControls: permute(input.planControls ?? [], order) };
      }
      return { ...input, planControls: reorderIn(input.planControls ?? []) };
    });

  let reordered: ControlInput[];
  if (parentAlias === null) {
    reordered = permute(roots, order);
  } else {
    if (!findControl(assessment, parentAlias)) {
      throw new PolicyCompilerError(ErrorCode.INVALID_INPUT, `Control not found: ${parentAlias}`);
    }
    reordered = reorderIn(roots);
  }

  return { ...assessment, planControls: assignAliases(reordered) };
}
