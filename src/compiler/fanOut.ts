import type { GraphNode } from '../types/nodeGraph';
import { getNodeDefinition } from '../nodes/definitions';
import { incomingLink, type GraphIndex } from './graphIndex';

export interface FanOut {
  /** nodeId → number of input sockets, on other ordered nodes, that read it */
  counts: Map<number, number>;
  /** nodeId → output keys that at least one of those sockets reads */
  consumedOutputs: Map<number, Set<string>>;
}

/**
 * Counts link usages, not links: one producer wired into three sockets
 * counts three. Only links that resolve are counted, i.e. the producer
 * precedes the consumer in `order` (cycle-broken links never do).
 */
export function countFanOut(index: GraphIndex, order: GraphNode[]): FanOut {
  const position = new Map(order.map((n, i) => [n.id, i]));
  const counts = new Map(order.map(n => [n.id, 0]));
  const consumedOutputs = new Map<number, Set<string>>();

  order.forEach((consumer, consumerPos) => {
    if (!getNodeDefinition(consumer.type)) return;
    for (const inputKey of Object.keys(consumer.inputs)) {
      const link = incomingLink(index, consumer.id, inputKey);
      if (!link || link.sourceNodeId === consumer.id) continue;
      const producerPos = position.get(link.sourceNodeId);
      if (producerPos === undefined || producerPos >= consumerPos) continue;

      counts.set(link.sourceNodeId, (counts.get(link.sourceNodeId) ?? 0) + 1);
      let keys = consumedOutputs.get(link.sourceNodeId);
      if (!keys) {
        keys = new Set();
        consumedOutputs.set(link.sourceNodeId, keys);
      }
      keys.add(link.sourceOutputKey);
    }
  });

  return { counts, consumedOutputs };
}
