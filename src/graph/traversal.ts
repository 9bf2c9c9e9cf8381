/**
 * Control-Link Traverser for Policy Compiler
 *
 * Walks the control-link graph breadth-first from one control and collects
 * the evidence schemas reachable from it.
 *
 * The walk is level-synchronous: the reads for one level are issued
 * concurrently (at most `concurrency` at a time) and the results are merged
 * by this loop alone, in frontier order. The visited set and the evidence
 * map therefore have a single writer, and discovery order does not depend on
 * which read finishes first.
 *
 * Read failures never abort the walk; they become TraversalWarnings and the
 * other branches carry on.
 */

import { DEFAULT_CONFIG } from '../config.js';
import { ErrorCode, PolicyCompilerError, formatError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import type {
  ControlGraphReader,
  ControlLink,
  EvidenceConfig,
  EvidenceSchema,
  ResolvedEvidence,
  TraversalOptions,
  TraversalResult,
  TraversalWarning,
  VisitedControl,
} from './types.js';
import { TraversalWarningKind } from './types.js';

interface NodeRead {
  readonly links: readonly ControlLink[];
  readonly configs: readonly EvidenceConfig[];
  readonly linksError?: string;
  readonly configsError?: string;
}

type SchemaRead = { readonly schema: EvidenceSchema } | { readonly error: string };

interface PendingEvidence {
  readonly config: EvidenceConfig;
  readonly controlIds: string[];
}

interface CollectedEvidence {
  readonly config: EvidenceConfig;
  readonly schema: EvidenceSchema;
  readonly controlIds: string[];
}

type Settled<T> = { readonly value: T } | { readonly error: string };

/**
 * Await a read, capturing a synchronous throw or a rejection alike
 */
async function settle<T>(read: () => Promise<T>): Promise<Settled<T>> {
  try {
    return { value: await read() };
  } catch (err) {
    return { error: formatError(err) };
  }
}

/**
 * Run `task` over `items` with at most `limit` in flight, preserving order
 */
async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  const size = Math.max(1, limit);
  for (let i = 0; i < items.length; i += size) {
    const batch = await Promise.all(items.slice(i, i + size).map(task));
    results.push(...batch);
  }
  return results;
}

/**
 * Control-Link Traverser
 */
export class ControlLinkTraverser {
  private readonly graph: ControlGraphReader;
  private readonly logger: Logger;
  private readonly defaultOptions: Required<TraversalOptions>;

  constructor(
    graph: ControlGraphReader,
    options: { logger?: Logger; defaults?: TraversalOptions } = {}
  ) {
    this.graph = graph;
    this.logger = options.logger ?? silentLogger;
    this.defaultOptions = {
      maxDepth: options.defaults?.maxDepth ?? DEFAULT_CONFIG.traversal.maxDepth,
      maxNodes: options.defaults?.maxNodes ?? DEFAULT_CONFIG.traversal.maxNodes,
      concurrency: options.defaults?.concurrency ?? DEFAULT_CONFIG.traversal.concurrency,
    };
  }

  /**
   * Traverse from a control and resolve every reachable evidence schema
   */
  async traverse(startId: string, options: TraversalOptions = {}): Promise<TraversalResult> {
    const start = startId.trim();
    if (start.length === 0) {
      throw new PolicyCompilerError(ErrorCode.INVALID_INPUT, 'Start control id is required');
    }

    const opts: Required<TraversalOptions> = {
      maxDepth: options.maxDepth ?? this.defaultOptions.maxDepth,
      maxNodes: options.maxNodes ?? this.defaultOptions.maxNodes,
      concurrency: options.concurrency ?? this.defaultOptions.concurrency,
    };
    const visited: VisitedControl[] = [];
    const claimed = new Set<string>([start]);
    const evidence = new Map<string, CollectedEvidence>();
    const unresolved = new Set<string>();
    const warnings: TraversalWarning[] = [];
    let depthTruncated = false;
    let nodesTruncated = false;

    const warn = (warning: TraversalWarning): void => {
      warnings.push(warning);
      this.logger.warn(warning.message, {
        kind: warning.kind,
        controlId: warning.controlId,
        evidenceConfigId: warning.evidenceConfigId,
      });
    };

    let frontier: VisitedControl[] = [{ id: start, depth: 0 }];

    while (frontier.length > 0) {
      const reads = await mapBounded(frontier, opts.concurrency, (node) => this.readNode(node.id));
      const next: VisitedControl[] = [];
      const pending = new Map<string, PendingEvidence>();

      frontier.forEach((node, index) => {
        const read = reads[index];
        visited.push(node);
        if (read === undefined) {
          return;
        }

        if (read.configsError !== undefined) {
          warn({
            kind: TraversalWarningKind.BRANCH_READ_FAILURE,
            message: `Failed to read evidence configs of ${node.id}: ${read.configsError}`,
            controlId: node.id,
          });
        }
        if (read.linksError !== undefined) {
          warn({
            kind: TraversalWarningKind.BRANCH_READ_FAILURE,
            message: `Failed to read links of ${node.id}: ${read.linksError}`,
            controlId: node.id,
          });
        }

        for (const config of read.configs) {
          const known = evidence.get(config.id) ?? pending.get(config.id);
          if (known) {
            if (!known.controlIds.includes(node.id)) {
              known.controlIds.push(node.id);
            }
          } else if (!unresolved.has(config.id)) {
            pending.set(config.id, { config, controlIds: [node.id] });
          }
        }

        for (const link of read.links) {
          if (claimed.has(link.targetId)) {
            continue;
          }
          if (node.depth + 1 > opts.maxDepth) {
            if (!depthTruncated) {
              depthTruncated = true;
              warn({
                kind: TraversalWarningKind.TRAVERSAL_TRUNCATED,
                message: `Traversal from ${start} stopped at max depth ${opts.maxDepth}`,
                controlId: node.id,
              });
            }
            continue;
          }
          if (claimed.size >= opts.maxNodes) {
            if (!nodesTruncated) {
              nodesTruncated = true;
              warn({
                kind: TraversalWarningKind.TRAVERSAL_TRUNCATED,
                message: `Traversal from ${start} stopped at ${opts.maxNodes} controls`,
                controlId: node.id,
              });
            }
            continue;
          }

          claimed.add(link.targetId);
          next.push(
            link.referenceType !== undefined
              ? {
                  id: link.targetId,
                  depth: node.depth + 1,
                  discoveredFrom: node.id,
                  referenceType: link.referenceType,
                }
              : { id: link.targetId, depth: node.depth + 1, discoveredFrom: node.id }
          );
        }
      });

      const entries = Array.from(pending.values());
      const schemas = await mapBounded(entries, opts.concurrency, (entry) =>
        this.readSchema(entry.config.id)
      );
      entries.forEach((entry, index) => {
        const read = schemas[index];
        if (read !== undefined && 'schema' in read) {
          evidence.set(entry.config.id, { ...entry, schema: read.schema });
          return;
        }
        unresolved.add(entry.config.id);
        warn({
          kind: TraversalWarningKind.SCHEMA_RESOLUTION_FAILURE,
          message: `No usable schema for evidence ${entry.config.name} (${entry.config.id}): ${
            read?.error ?? 'not read'
          }`,
          controlId: entry.controlIds[0],
          evidenceConfigId: entry.config.id,
        });
      });

      frontier = next;
    }

    this.logger.debug('traversal complete', {
      startId: start,
      visited: visited.length,
      evidence: evidence.size,
      warnings: warnings.length,
    });

    return {
      startId: start,
      visited,
      evidence: new Map<string, ResolvedEvidence>(evidence),
      warnings,
      truncated: depthTruncated || nodesTruncated,
    };
  }

  private async readNode(controlId: string): Promise<NodeRead> {
    const [links, configs] = await Promise.all([
      settle(() => this.graph.getLinkedControls(controlId)),
      settle(() => this.graph.getEvidenceConfigs(controlId)),
    ]);

    return {
      links: 'value' in links ? links.value : [],
      configs: 'value' in configs ? configs.value : [],
      ...('error' in links ? { linksError: links.error } : {}),
      ...('error' in configs ? { configsError: configs.error } : {}),
    };
  }

  private async readSchema(evidenceConfigId: string): Promise<SchemaRead> {
    try {
      const schema = await this.graph.getEvidenceSchema(evidenceConfigId);
      if (schema === null) {
        return { error: 'schema not found' };
      }
      if (schema.fields.length === 0) {
        return { error: 'schema has no fields' };
      }
      return {
        schema: { ...schema, fields: [...schema.fields].sort((a, b) => a.order - b.order) },
      };
    } catch (err) {
      return { error: formatError(err) };
    }
  }
}

/**
 * Create a control-link traverser
 */
export function createControlLinkTraverser(
  graph: ControlGraphReader,
  options?: { logger?: Logger; defaults?: TraversalOptions }
): ControlLinkTraverser {
  return new ControlLinkTraverser(graph, options);
}

/**
 * All resolved evidence in discovery order
 */
export function resolvedEvidenceList(result: TraversalResult): ResolvedEvidence[] {
  return Array.from(result.evidence.values());
}
