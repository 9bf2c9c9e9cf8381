/**
 * Command implementations for the Policy Compiler CLI.
 *
 * Each command takes already-read inputs and returns a CLIResult; reading
 * files and printing belong to the program wiring, so commands can be run
 * directly from tests.
 */

import { z } from 'zod';
import type { CompilerConfig } from '../src/config.js';
import { formatError } from '../src/core/errors.js';
import type { Logger } from '../src/core/logging/logger.js';
import { extractRequirements } from '../src/extraction/requirement-extractor.js';
import type { ExtractionResult } from '../src/extraction/requirement-extractor.js';
import type { GroupingHint } from '../src/hierarchy/hierarchy-builder.js';
import { buildAssessment } from '../src/hierarchy/hierarchy-builder.js';
import { parseAssessment, serializeAssessment } from '../src/hierarchy/assessment-document.js';
import type { Assessment } from '../src/hierarchy/types.js';
import { loadControlGraph } from '../src/graph/memory-graph.js';
import { buildSourceSummary, formatSourceSummary } from '../src/graph/source-summary.js';
import { ControlLinkTraverser } from '../src/graph/traversal.js';
import type { TraversalResult } from '../src/graph/types.js';
import { SqlSynthesizer } from '../src/sql/synthesizer.js';
import type { PerEvidenceResult } from '../src/sql/synthesizer.js';
import type {
  AssessmentContext,
  ControlContext,
  SynthesisOutcome,
  SynthesisResult,
} from '../src/sql/types.js';
import type { LintConfig } from './lint.js';
import { AssessmentLinter } from './lint.js';

/**
 * CLI execution result
 */
export interface CLIResult {
  /** Whether the command succeeded */
  readonly success: boolean;
  readonly exitCode: number;
  /** Text for stdout */
  readonly output: string;
  /** Text for stderr */
  readonly error?: string;
}

export interface CommandContext {
  readonly config: CompilerConfig;
  readonly logger: Logger;
}

function ok(output: string): CLIResult {
  return { success: true, exitCode: 0, output };
}

function fail(error: string, output: string = ''): CLIResult {
  return { success: false, exitCode: 1, output, error };
}

/**
 * Run `action`, turning thrown errors into a failed result
 */
async function guarded(action: () => Promise<CLIResult> | CLIResult): Promise<CLIResult> {
  try {
    return await action();
  } catch (err) {
    if (err instanceof Error) {
      return fail(formatError(err));
    }
    throw err;
  }
}

// -- compile ---------------------------------------------------------------

const GroupingHintsSchema = z.array(
  z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    requirementIds: z.array(z.string().min(1)),
  })
);

export function parseGroupingHints(input: unknown): GroupingHint[] {
  const parsed = GroupingHintsSchema.safeParse(input);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid grouping hints:\n${msg}`);
  }
  return parsed.data.map((hint) =>
    hint.description !== undefined
      ? { name: hint.name, description: hint.description, requirementIds: hint.requirementIds }
      : { name: hint.name, requirementIds: hint.requirementIds }
  );
}

export interface CompileOptions {
  readonly name: string;
  readonly description?: string;
  readonly categoryName?: string;
  readonly splitCompound?: boolean;
  readonly groupingHints?: readonly GroupingHint[];
}

export interface CompiledDocument {
  readonly extraction: ExtractionResult;
  readonly assessment: Assessment;
  readonly yaml: string;
}

/**
 * Extract requirements from a policy document and build its Assessment
 */
export function compileDocument(
  text: string,
  options: CompileOptions,
  context: CommandContext
): CompiledDocument {
  const extraction = extractRequirements(text, {
    splitCompound: options.splitCompound ?? context.config.extraction.splitCompound,
    logger: context.logger.child('extraction'),
  });

  const assessment = buildAssessment(extraction.requirements, {
    name: options.name,
    ...(options.description !== undefined ? { description: options.description } : {}),
    ...(options.categoryName !== undefined ? { categoryName: options.categoryName } : {}),
    ...(options.groupingHints !== undefined ? { groupingHints: options.groupingHints } : {}),
    logger: context.logger.child('hierarchy'),
  });

  return { extraction, assessment, yaml: serializeAssessment(assessment) };
}

export function runCompile(
  text: string,
  options: CompileOptions,
  context: CommandContext
): Promise<CLIResult> {
  return guarded(() => ok(compileDocument(text, options, context).yaml));
}

// -- lint ------------------------------------------------------------------

export interface LintCommandOptions {
  readonly format: 'text' | 'json' | 'sarif';
  readonly verbose?: boolean;
  readonly strict?: boolean;
  /** Reported as the SARIF artifact location */
  readonly uri?: string;
}

export function runLint(yamlText: string, options: LintCommandOptions): Promise<CLIResult> {
  return guarded(() => {
    const assessment = parseAssessment(yamlText, { verify: false });
    const config: LintConfig = { rules: {}, warningsAsErrors: options.strict ?? false };
    const linter = new AssessmentLinter(config);
    const result = linter.lint(assessment);

    const output =
      options.format === 'json'
        ? linter.formatResultJSON(result)
        : options.format === 'sarif'
          ? linter.formatResultSARIF(result, options.uri)
          : linter.formatResult(result, options.verbose ?? false);

    return result.passed ? ok(output) : { success: false, exitCode: 1, output };
  });
}

// -- traverse --------------------------------------------------------------

export interface TraverseCommandOptions {
  readonly maxDepth?: number;
  readonly maxNodes?: number;
  readonly json?: boolean;
}

async function traverseFixture(
  fixture: unknown,
  controlId: string,
  options: { maxDepth?: number; maxNodes?: number },
  context: CommandContext
): Promise<TraversalResult> {
  const graph = loadControlGraph(fixture);
  if (!graph.hasControl(controlId)) {
    throw new Error(`Control not found in graph: ${controlId}`);
  }
  const traverser = new ControlLinkTraverser(graph, {
    logger: context.logger.child('traversal'),
    defaults: context.config.traversal,
  });
  return traverser.traverse(controlId, {
    ...(options.maxDepth !== undefined ? { maxDepth: options.maxDepth } : {}),
    ...(options.maxNodes !== undefined ? { maxNodes: options.maxNodes } : {}),
  });
}

export function runTraverse(
  fixture: unknown,
  controlId: string,
  options: TraverseCommandOptions,
  context: CommandContext
): Promise<CLIResult> {
  return guarded(async () => {
    const result = await traverseFixture(fixture, controlId, options, context);
    const summary = buildSourceSummary(result);
    const output = options.json
      ? JSON.stringify({ ...summary, warnings: result.warnings }, null, 2)
      : formatSourceSummary(summary);
    return ok(output);
  });
}

// -- synthesize ------------------------------------------------------------

export interface SynthesizeCommandOptions {
  readonly control: ControlContext;
  readonly assessment: AssessmentContext;
  readonly perEvidence?: boolean;
  readonly json?: boolean;
}

function formatOutcome(label: string, outcome: SynthesisOutcome): string {
  return outcome.ok
    ? `-- ${label}\n${outcome.artifact.sql}`
    : `-- ${label} failed: ${formatError(outcome.error)}`;
}

/**
 * One block per query, separated by blank lines and left unterminated,
 * so each is copied and run on its own
 */
function formatResult(result: SynthesisResult, heading?: string): string {
  const header = [...(heading !== undefined ? [`-- ${heading}`] : []), `-- plan: ${result.plan}`];
  return [
    header.join('\n'),
    formatOutcome('selection', result.selection),
    formatOutcome('summary', result.summary),
  ].join('\n\n');
}

function outcomeJson(outcome: SynthesisOutcome): Record<string, unknown> {
  return outcome.ok
    ? { ok: true, ...outcome.artifact }
    : { ok: false, code: outcome.error.code, error: outcome.error.message };
}

function anySucceeded(results: readonly SynthesisResult[]): boolean {
  return results.some((r) => r.selection.ok || r.summary.ok);
}

export function runSynthesize(
  fixture: unknown,
  controlId: string,
  options: SynthesizeCommandOptions,
  context: CommandContext
): Promise<CLIResult> {
  return guarded(async () => {
    const traversal = await traverseFixture(fixture, controlId, {}, context);
    const synthesizer = new SqlSynthesizer({ logger: context.logger.child('sql') });

    if (options.perEvidence) {
      const results: PerEvidenceResult[] = synthesizer.synthesizePerEvidence(
        traversal,
        options.control,
        options.assessment
      );
      const output = options.json
        ? JSON.stringify(
            results.map((r) => ({
              evidence: r.evidenceName,
              plan: r.result.plan,
              selection: outcomeJson(r.result.selection),
              summary: outcomeJson(r.result.summary),
            })),
            null,
            2
          )
        : results.map((r) => formatResult(r.result, r.evidenceName)).join('\n\n');
      const passed = anySucceeded(results.map((r) => r.result));
      return passed ? ok(output) : { success: false, exitCode: 1, output };
    }

    const result = synthesizer.synthesize(traversal, options.control, options.assessment);
    const output = options.json
      ? JSON.stringify(
          {
            plan: result.plan,
            selection: outcomeJson(result.selection),
            summary: outcomeJson(result.summary),
            warnings: traversal.warnings,
          },
          null,
          2
        )
      : formatResult(result);
    return anySucceeded([result]) ? ok(output) : { success: false, exitCode: 1, output };
  });
}
