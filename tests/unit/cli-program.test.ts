import { describe, it, expect } from '@jest/globals';
import { main } from '../../cli/program.js';
import type { ProgramIO } from '../../cli/program.js';
import { MemorySink } from '../../src/core/logging/logger.js';
import { parseAssessment } from '../../src/hierarchy/assessment-document.js';
import graphFixture from '../fixtures/control-graph.json';

interface Harness {
  readonly io: ProgramIO;
  readonly stdout: string[];
  readonly stderr: string[];
  readonly written: Map<string, string>;
  readonly sink: MemorySink;
}

function harness(files: Record<string, string>): Harness {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const written = new Map<string, string>();
  const sink = new MemorySink();
  const io: ProgramIO = {
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    readText: async (path) => {
      const text = written.get(path) ?? files[path];
      if (text === undefined) {
        throw new Error(`ENOENT: no such file, open '${path}'`);
      }
      return text;
    },
    writeText: async (path, text) => {
      written.set(path, text);
    },
    env: {},
    logSink: sink,
  };
  return { io, stdout, stderr, written, sink };
}

const FILES: Record<string, string> = {
  'policies/access.txt':
    'The organization must enforce MFA for all remote access and administrative accounts.',
  'graph.json': JSON.stringify(graphFixture),
  'hints.json': JSON.stringify([{ name: 'Strong Authentication', requirementIds: [] }]),
};

describe('CLI Program', () => {
  it('should compile a policy file to stdout', async () => {
    const h = harness(FILES);

    const code = await main(['compile', 'policies/access.txt'], h.io);

    expect(code).toBe(0);
    expect(h.stderr).toEqual([]);
    const assessment = parseAssessment(h.stdout[0] ?? '');
    expect(assessment.name).toBe('access');
    expect(assessment.categoryName).toBe('Access Management');
    expect(h.sink.entries.map((e) => e.message)).toEqual(['assessment built']);
  });

  it('should write the assessment to --out and lint it', async () => {
    const h = harness(FILES);

    const compiled = await main(
      ['compile', 'policies/access.txt', '--name', 'Access Control Policy', '--out', 'access.yaml'],
      h.io
    );
    const linted = await main(['lint', 'access.yaml'], h.io);

    expect(compiled).toBe(0);
    expect(linted).toBe(0);
    expect(h.stdout).toEqual(['Wrote access.yaml', '\nLinted 3 controls - no issues found']);
    expect(h.written.get('access.yaml')?.startsWith('apiVersion: policy-compiler/v1\n')).toBe(true);
  });

  it('should read grouping hints and the split flag', async () => {
    const h = harness(FILES);

    const code = await main(
      ['compile', 'policies/access.txt', '--no-split', '--hints', 'hints.json'],
      h.io
    );

    expect(code).toBe(0);
    const assessment = parseAssessment(h.stdout[0] ?? '');
    expect(assessment.planControls.map((c) => [c.alias, c.isLeaf])).toEqual([['1', true]]);
  });

  it('should report command failures on stderr', async () => {
    const h = harness({ 'empty.txt': 'Nothing to see.' });

    const code = await main(['compile', 'empty.txt'], h.io);

    expect(code).toBe(1);
    expect(h.stderr).toEqual(['Error: EXTRACTION_EMPTY: No requirements found in document']);
  });

  it('should report missing files', async () => {
    const h = harness({});

    const code = await main(['lint', 'missing.yaml'], h.io);

    expect(code).toBe(1);
    expect(h.stderr).toEqual(["Error: ENOENT: no such file, open 'missing.yaml'"]);
  });

  it('should traverse a graph fixture', async () => {
    const h = harness(FILES);

    const code = await main(['traverse', 'graph.json', 'ctrl-remote', '--max-depth', '1'], h.io);

    expect(code).toBe(0);
    expect(h.stdout[0]?.split('\n').slice(-2)).toEqual(['Traversal truncated', 'Next: SAMPLE_EVIDENCE']);
    expect(h.sink.entries.map((e) => [e.level, e.subsystem])).toEqual([
      ['warn', 'policy-compiler.traversal'],
    ]);
  });

  it('should synthesize queries from command-line filters and checks', async () => {
    const h = harness(FILES);

    const code = await main(
      [
        'synthesize',
        'graph.json',
        'ctrl-devices',
        '--filter',
        'status=active',
        '--scope-key',
        'employee_id',
        '--check',
        'encrypted:eq:true',
      ],
      h.io
    );

    expect(code).toBe(0);
    expect(h.stdout[0]).toBe(
      [
        '-- plan: SINGLE',
        '',
        '-- selection',
        'SELECT "device_id", "employee_id", "status", "encrypted"',
        'FROM "Devices"',
        `WHERE "status" = 'active'`,
        '',
        '-- summary',
        'SELECT',
        '  "employee_id",',
        '  COUNT(*) AS "total_count",',
        '  SUM(CASE WHEN "encrypted" = TRUE THEN 1 ELSE 0 END) AS "compliant_count",',
        '  SUM(CASE WHEN "encrypted" = TRUE THEN 0 ELSE 1 END) AS "non_compliant_count",',
        `  CASE WHEN SUM(CASE WHEN "encrypted" = TRUE THEN 0 ELSE 1 END) = 0 THEN 'COMPLIANT' ELSE 'NON_COMPLIANT' END AS "compliance_status"`,
        'FROM "Devices"',
        `WHERE "status" = 'active'`,
        'GROUP BY "employee_id"',
      ].join('\n')
    );
  });

  it('should exit with a usage error for bad option values', async () => {
    const h = harness(FILES);

    const code = await main(['synthesize', 'graph.json', 'ctrl-devices', '--filter', 'status'], h.io);

    expect(code).toBe(1);
    expect(h.stderr.join('')).toContain("Expected field=value, got 'status'");
    expect(h.stdout).toEqual([]);
  });

  it('should reject unknown lint formats', async () => {
    const h = harness(FILES);

    const code = await main(['lint', 'access.yaml', '--format', 'xml'], h.io);

    expect(code).toBe(1);
    expect(h.stderr.join('')).toContain('xml');
  });

  it('should print the version', async () => {
    const h = harness({});

    const code = await main(['--version'], h.io);

    expect(code).toBe(0);
    expect(h.stdout).toEqual(['0.1.0\n']);
  });
});
