import { getNodeDefinition } from '../nodes/definitions';
import { incomingLink, type GraphIndex } from './graphIndex';

/**
 * Ids of every node that feeds the sink through input links, the sink first.
 * Nodes of an unknown type are kept but not walked through: they produce
 * nothing, so nothing they consume can matter.
 */
export function collectReachable(index: GraphIndex, sinkId: number): Set<number> {
  const seen = new Set<number>();

  const visit = (nodeId: number) => {
    if (seen.has(nodeId)) return;
    const node = index.nodes.get(nodeId);
    if (!node) return;
    seen.add(nodeId);
    if (!getNodeDefinition(node.type)) return;

    for (const inputKey of Object.keys(node.inputs)) {
      const link = incomingLink(index, nodeId, inputKey);
      if (link) visit(link.sourceNodeId);
    }
  };

  visit(sinkId);
  return seen;
}
