#!/usr/bin/env node
/**
 * policy-compiler command-line entry point
 *
 *   policy-compiler compile <file> [--name <name>] [--category <name>] [--out <file>]
 *   policy-compiler lint <file> [--format text|json|sarif] [--strict]
 *   policy-compiler traverse <graph.json> <controlId>
 *   policy-compiler synthesize <graph.json> <controlId> [--filter f=v] [--check f:op:v]
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { Command, CommanderError, Option } from 'commander';
import { loadConfig } from '../src/config.js';
import { createLogger } from '../src/core/logging/logger.js';
import type { LogSink } from '../src/core/logging/logger.js';
import { VERSION } from '../src/index.js';
import type { ComplianceCheck, Filters } from '../src/sql/types.js';
import type { CLIResult, CommandContext } from './commands.js';
import { parseGroupingHints, runCompile, runLint, runSynthesize, runTraverse } from './commands.js';
import { collectFilter, parseComplianceCheck, parsePositiveInt } from './options.js';

export interface ProgramIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readText(path: string): Promise<string>;
  writeText(path: string, text: string): Promise<void>;
  env: NodeJS.ProcessEnv;
  logSink?: LogSink;
}

const defaultIO: ProgramIO = {
  stdout: (text) => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`),
  stderr: (text) => process.stderr.write(text.endsWith('\n') ? text : `${text}\n`),
  readText: (path) => readFile(path, 'utf8'),
  writeText: (path, text) => writeFile(path, text, 'utf8'),
  env: process.env,
};

async function readJson(io: ProgramIO, path: string): Promise<unknown> {
  const text = await io.readText(path);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function defaultName(path: string): string {
  return basename(path, extname(path));
}

/**
 * Build the commander program. Exit codes are collected into `state`;
 * commander errors are thrown as CommanderError instead of exiting.
 */
export function createProgram(
  io: ProgramIO = defaultIO,
  state: { exitCode: number } = { exitCode: 0 }
): Command {
  const program = new Command();
  // Set before the subcommands are added so they inherit both
  program.exitOverride();
  program.configureOutput({
    writeOut: (text) => io.stdout(text),
    writeErr: (text) => io.stderr(text),
  });

  const context = (): CommandContext => {
    const config = loadConfig(io.env);
    const logger = createLogger({
      level: config.logLevel,
      ...(io.logSink !== undefined ? { sink: io.logSink } : {}),
    });
    return { config, logger };
  };

  const report = (result: CLIResult): void => {
    if (result.output.length > 0) {
      io.stdout(result.output);
    }
    if (result.error !== undefined) {
      io.stderr(`Error: ${result.error}`);
    }
    state.exitCode = Math.max(state.exitCode, result.exitCode);
  };

  program
    .name('policy-compiler')
    .description('Compile governance policies into assessments and synthesize evidence queries')
    .version(VERSION);

  // ── compile ──────────────────────────────────────────────────
  program
    .command('compile')
    .description('Extract requirements from a policy document and emit its Assessment as YAML')
    .argument('<file>', 'policy text file')
    .option('--name <name>', 'assessment name (default: file name)')
    .option('--description <text>', 'assessment description')
    .option('--category <name>', 'reusable category name')
    .option('--hints <file>', 'JSON file of grouping hints')
    .option('--no-split', 'keep compound obligations as one requirement')
    .option('--out <file>', 'write the YAML here instead of stdout')
    .action(
      async (
        file: string,
        opts: {
          name?: string;
          description?: string;
          category?: string;
          hints?: string;
          split: boolean;
          out?: string;
        }
      ) => {
        const text = await io.readText(file);
        const hints =
          opts.hints !== undefined ? parseGroupingHints(await readJson(io, opts.hints)) : undefined;
        const result = await runCompile(
          text,
          {
            name: opts.name ?? defaultName(file),
            ...(opts.description !== undefined ? { description: opts.description } : {}),
            ...(opts.category !== undefined ? { categoryName: opts.category } : {}),
            ...(hints !== undefined ? { groupingHints: hints } : {}),
            ...(opts.split ? {} : { splitCompound: false }),
          },
          context()
        );

        if (result.success && opts.out !== undefined) {
          await io.writeText(opts.out, result.output);
          report({ ...result, output: `Wrote ${opts.out}` });
          return;
        }
        report(result);
      }
    );

  // ── lint ─────────────────────────────────────────────────────
  program
    .command('lint')
    .description('Lint an Assessment YAML document')
    .argument('<file>', 'assessment YAML file')
    .addOption(
      new Option('--format <format>', 'output format').choices(['text', 'json', 'sarif']).default('text')
    )
    .option('--strict', 'treat warnings as errors', false)
    .option('-v, --verbose', 'show suggestions', false)
    .action(
      async (
        file: string,
        opts: { format: 'text' | 'json' | 'sarif'; strict: boolean; verbose: boolean }
      ) => {
        const text = await io.readText(file);
        report(
          await runLint(text, {
            format: opts.format,
            strict: opts.strict,
            verbose: opts.verbose,
            uri: file,
          })
        );
      }
    );

  // ── traverse ─────────────────────────────────────────────────
  program
    .command('traverse')
    .description('Show the controls and evidence reachable from a control')
    .argument('<graph>', 'control graph JSON fixture')
    .argument('<controlId>', 'start control')
    .option('--max-depth <n>', 'maximum link depth', parsePositiveInt)
    .option('--max-nodes <n>', 'maximum controls to visit', parsePositiveInt)
    .option('--json', 'output as JSON', false)
    .action(
      async (
        graphFile: string,
        controlId: string,
        opts: { maxDepth?: number; maxNodes?: number; json: boolean }
      ) => {
        const fixture = await readJson(io, graphFile);
        report(await runTraverse(fixture, controlId, opts, context()));
      }
    );

  // ── synthesize ───────────────────────────────────────────────
  program
    .command('synthesize')
    .description('Synthesize the selection and compliance-summary SQL for a control')
    .argument('<graph>', 'control graph JSON fixture')
    .argument('<controlId>', 'control to synthesize for')
    .option('--filter <field=value>', 'control filter (repeatable)', collectFilter, {})
    .option('--assessment-filter <field=value>', 'assessment filter (repeatable)', collectFilter, {})
    .option('--scope-key <field>', 'field the summary groups by')
    .option('--check <field:op[:value]>', 'compliance check', parseComplianceCheck)
    .option('--per-evidence', 'one query pair per evidence table', false)
    .option('--json', 'output as JSON', false)
    .action(
      async (
        graphFile: string,
        controlId: string,
        opts: {
          filter: Filters;
          assessmentFilter: Filters;
          scopeKey?: string;
          check?: ComplianceCheck;
          perEvidence: boolean;
          json: boolean;
        }
      ) => {
        const fixture = await readJson(io, graphFile);
        report(
          await runSynthesize(
            fixture,
            controlId,
            {
              control: {
                filters: opts.filter,
                ...(opts.scopeKey !== undefined ? { scopeKey: opts.scopeKey } : {}),
                ...(opts.check !== undefined ? { complianceCheck: opts.check } : {}),
              },
              assessment: { filters: opts.assessmentFilter },
              perEvidence: opts.perEvidence,
              json: opts.json,
            },
            context()
          )
        );
      }
    );

  return program;
}

/**
 * CLI main function
 */
export async function main(argv: string[], io: ProgramIO = defaultIO): Promise<number> {
  const state = { exitCode: 0 };
  const program = createProgram(io, state);

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help, --version and usage errors
      return err.exitCode;
    }
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  return state.exitCode;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    }
  );
}
