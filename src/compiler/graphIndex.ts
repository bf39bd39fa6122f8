import type { CompileDiagnostic, GraphLink, GraphNode, NodeGraph } from '../types/nodeGraph';
import { conformToDefinition } from '../nodes/instantiate';

/**
 * Id-based lookups over a graph snapshot. Nodes carry their definition's
 * sockets, whatever the snapshot stored. Links that point nowhere are left out.
 */
export interface GraphIndex {
  nodes: Map<number, GraphNode>;
  /** targetNodeId → targetInputKey → the link feeding that input */
  incoming: Map<number, Map<string, GraphLink>>;
}

function describe(link: GraphLink): string {
  return `${link.sourceNodeId}.${link.sourceOutputKey} → ${link.targetNodeId}.${link.targetInputKey}`;
}

export function indexGraph(graph: NodeGraph, diagnostics: CompileDiagnostic[] = []): GraphIndex {
  const nodes = new Map(graph.nodes.map(n => [n.id, conformToDefinition(n)]));
  const incoming = new Map<number, Map<string, GraphLink>>();

  for (const link of graph.links) {
    const source = nodes.get(link.sourceNodeId);
    const target = nodes.get(link.targetNodeId);
    let problem: string | null = null;
    if (!source) problem = `source node ${link.sourceNodeId} does not exist`;
    else if (!target) problem = `target node ${link.targetNodeId} does not exist`;
    else if (!Object.hasOwn(source.outputs, link.sourceOutputKey)) problem = `node ${source.id} has no output "${link.sourceOutputKey}"`;
    else if (!Object.hasOwn(target.inputs, link.targetInputKey)) problem = `node ${target.id} has no input "${link.targetInputKey}"`;

    if (problem) {
      diagnostics.push({
        kind: 'dangling-link',
        message: `Ignoring link ${describe(link)}: ${problem}`,
        nodeId: link.targetNodeId,
      });
      continue;
    }

    // A later link onto the same input replaces the earlier one
    let byInput = incoming.get(link.targetNodeId);
    if (!byInput) {
      byInput = new Map();
      incoming.set(link.targetNodeId, byInput);
    }
    byInput.set(link.targetInputKey, link);
  }

  return { nodes, incoming };
}

export function incomingLink(index: GraphIndex, nodeId: number, inputKey: string): GraphLink | undefined {
  return index.incoming.get(nodeId)?.get(inputKey);
}
