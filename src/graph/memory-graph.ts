/**
 * In-memory control graph.
 *
 * Backs the CLI and tests with a ControlGraphReader built from a JSON
 * fixture:
 *
 *   {
 *     "controls": [{ "id": "A", "links": [{ "target": "B" }], "evidence": ["login-events"] }],
 *     "evidence": [{ "id": "login-events", "name": "LoginEvents",
 *                    "fields": [{ "name": "user", "type": "STRING" }] }]
 *   }
 *
 * Field `order` defaults to the field's position in the list.
 */

import { z } from 'zod';
import type {
  ControlGraphReader,
  ControlLink,
  EvidenceConfig,
  EvidenceField,
  EvidenceSchema,
} from './types.js';

const FieldSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  mode: z.string().optional(),
  order: z.number().int().nonnegative().optional(),
});

const EvidenceSchemaEntry = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  fileName: z.string().optional(),
  fields: z.array(FieldSchema).optional(),
});

const ControlEntry = z.object({
  id: z.string().min(1),
  links: z
    .array(
      z.union([
        z.string().min(1).transform((target) => ({ target })),
        z.object({ target: z.string().min(1), referenceType: z.string().optional() }),
      ])
    )
    .default([]),
  evidence: z.array(z.string().min(1)).default([]),
});

export const GraphFixtureSchema = z.object({
  controls: z.array(ControlEntry),
  evidence: z.array(EvidenceSchemaEntry).default([]),
});

export type GraphFixture = z.input<typeof GraphFixtureSchema>;

/**
 * Control graph held in memory
 */
export class InMemoryControlGraph implements ControlGraphReader {
  private readonly links = new Map<string, ControlLink[]>();
  private readonly controlEvidence = new Map<string, string[]>();
  private readonly configs = new Map<string, EvidenceConfig>();
  private readonly schemas = new Map<string, EvidenceSchema>();

  addControl(id: string): this {
    if (!this.links.has(id)) {
      this.links.set(id, []);
      this.controlEvidence.set(id, []);
    }
    return this;
  }

  link(sourceId: string, targetId: string, referenceType?: string): this {
    this.addControl(sourceId);
    const links = this.links.get(sourceId) ?? [];
    links.push(referenceType !== undefined ? { targetId, referenceType } : { targetId });
    this.links.set(sourceId, links);
    return this;
  }

  addEvidence(config: EvidenceConfig, fields?: readonly Omit<EvidenceField, 'order'>[]): this {
    this.configs.set(config.id, config);
    if (fields !== undefined) {
      this.schemas.set(config.id, {
        evidenceConfigId: config.id,
        fields: fields.map((field, order) => ({ ...field, order })),
      });
    }
    return this;
  }

  setSchema(schema: EvidenceSchema): this {
    this.schemas.set(schema.evidenceConfigId, schema);
    return this;
  }

  attachEvidence(controlId: string, evidenceConfigId: string): this {
    this.addControl(controlId);
    const attached = this.controlEvidence.get(controlId) ?? [];
    if (!attached.includes(evidenceConfigId)) {
      attached.push(evidenceConfigId);
    }
    this.controlEvidence.set(controlId, attached);
    return this;
  }

  hasControl(id: string): boolean {
    return this.links.has(id);
  }

  async getLinkedControls(controlId: string): Promise<readonly ControlLink[]> {
    return [...(this.links.get(controlId) ?? [])];
  }

  async getEvidenceConfigs(controlId: string): Promise<readonly EvidenceConfig[]> {
    const ids = this.controlEvidence.get(controlId) ?? [];
    // An attachment without a config still surfaces, with its id as name
    return ids.map((id) => this.configs.get(id) ?? { id, name: id });
  }

  async getEvidenceSchema(evidenceConfigId: string): Promise<EvidenceSchema | null> {
    const schema = this.schemas.get(evidenceConfigId);
    if (!schema) {
      return null;
    }
    return { ...schema, fields: [...schema.fields].sort((a, b) => a.order - b.order) };
  }
}

/**
 * Build an in-memory graph from a fixture object
 */
export function loadControlGraph(input: unknown): InMemoryControlGraph {
  const parsed = GraphFixtureSchema.safeParse(input);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid graph fixture:\n${msg}`);
  }

  const graph = new InMemoryControlGraph();

  for (const entry of parsed.data.evidence) {
    const config: EvidenceConfig = {
      id: entry.id,
      name: entry.name,
      ...(entry.description !== undefined ? { description: entry.description } : {}),
      ...(entry.fileName !== undefined ? { fileName: entry.fileName } : {}),
    };
    graph.addEvidence(config);
    if (entry.fields !== undefined) {
      graph.setSchema({
        evidenceConfigId: entry.id,
        fields: entry.fields.map((field, index) => ({
          name: field.name,
          type: field.type,
          ...(field.mode !== undefined ? { mode: field.mode } : {}),
          order: field.order ?? index,
        })),
      });
    }
  }

  for (const control of parsed.data.controls) {
    graph.addControl(control.id);
    for (const link of control.links) {
      graph.link(control.id, link.target, 'referenceType' in link ? link.referenceType : undefined);
    }
    for (const evidenceId of control.evidence) {
      graph.attachEvidence(control.id, evidenceId);
    }
  }

  return graph;
}

/**
 * Create an empty in-memory graph
 */
export function createInMemoryControlGraph(): InMemoryControlGraph {
  return new InMemoryControlGraph();
}
