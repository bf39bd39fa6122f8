import { z } from 'zod';
import type { NodeGraph } from '../types/nodeGraph';

export const GRAPH_SNAPSHOT_VERSION = 1;

const DataTypeSchema = z.enum(['float', 'vec2', 'vec3', 'vec4']);

const SocketSchema = z.object({
  type: DataTypeSchema,
  label: z.string(),
});

const InputSocketSchema = SocketSchema.extend({
  defaultValue: z.string().min(1),
  accepts: z.enum(['same', 'any']).optional(),
});

const GraphNodeSchema = z.object({
  id: z.number().int().nonnegative(),
  type: z.string().min(1),
  position: z.object({ x: z.number(), y: z.number() }),
  inputs: z.record(z.string(), InputSocketSchema),
  outputs: z.record(z.string(), SocketSchema),
  params: z.record(z.string(), z.unknown()),
});

const GraphLinkSchema = z.object({
  sourceNodeId: z.number().int(),
  sourceOutputKey: z.string(),
  targetNodeId: z.number().int(),
  targetInputKey: z.string(),
});

export const GraphSnapshotSchema = z
  .object({
    version: z.literal(GRAPH_SNAPSHOT_VERSION),
    nodes: z.array(GraphNodeSchema),
    links: z.array(GraphLinkSchema),
  })
  .superRefine((snapshot, ctx) => {
    const seen = new Set<number>();
    snapshot.nodes.forEach((node, i) => {
      if (seen.has(node.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate node id ${node.id}`,
          path: ['nodes', i, 'id'],
        });
      }
      seen.add(node.id);
    });
  });

export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>;

export type ParseSnapshotResult =
  | { success: true; graph: NodeGraph }
  | { success: false; errors: string[] };

/** Parse and validate a JSON snapshot produced by `serializeGraph`. */
export function parseGraphSnapshot(json: string): ParseSnapshotResult {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    return { success: false, errors: [`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`] };
  }

  const parsed = GraphSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      errors: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }
  return { success: true, graph: { nodes: parsed.data.nodes, links: parsed.data.links } };
}

export function serializeGraph(graph: NodeGraph): string {
  const snapshot: GraphSnapshot = { version: GRAPH_SNAPSHOT_VERSION, nodes: graph.nodes, links: graph.links };
  return JSON.stringify(snapshot, null, 2);
}
