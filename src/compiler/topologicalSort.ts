import type { GraphLink, GraphNode } from '../types/nodeGraph';
import { getNodeDefinition } from '../nodes/definitions';
import { incomingLink, type GraphIndex } from './graphIndex';

export interface TopologicalOrder {
  /** Every node after all the producers it consumes */
  order: GraphNode[];
  /** Links dropped because they closed a cycle */
  brokenLinks: GraphLink[];
}

/**
 * Depth-first post-order over the reachable set. A link whose producer is
 * still on the current path closes a cycle: it is dropped and the walk does
 * not descend, so the consumer later falls back to the socket default.
 */
export function topologicalSort(index: GraphIndex, reachable: Set<number>): TopologicalOrder {
  const onPath = new Set<number>();
  const done = new Set<number>();
  const order: GraphNode[] = [];
  const brokenLinks: GraphLink[] = [];

  const visit = (node: GraphNode) => {
    onPath.add(node.id);

    if (getNodeDefinition(node.type)) {
      for (const inputKey of Object.keys(node.inputs)) {
        const link = incomingLink(index, node.id, inputKey);
        if (!link || !reachable.has(link.sourceNodeId)) continue;
        if (done.has(link.sourceNodeId)) continue;
        if (onPath.has(link.sourceNodeId)) {
          brokenLinks.push(link);
          continue;
        }
        const producer = index.nodes.get(link.sourceNodeId);
        if (producer) visit(producer);
      }
    }

    onPath.delete(node.id);
    done.add(node.id);
    order.push(node);
  };

  for (const nodeId of reachable) {
    const node = index.nodes.get(nodeId);
    if (node && !done.has(nodeId)) visit(node);
  }

  return { order, brokenLinks };
}
