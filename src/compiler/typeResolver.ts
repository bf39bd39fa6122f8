import type { DataType, GraphNode, InputSocket, InputTypeProbe, NodeDefinition, NodeGraph } from '../types/nodeGraph';
import { getNodeDefinition } from '../nodes/definitions';
import { incomingLink, indexGraph } from './graphIndex';

/**
 * How a producer's value lands on an input socket:
 * - `direct`: same kind, or a socket that accepts any kind
 * - `broadcast`: a float spread over every component of a vector socket
 * - `mismatch`: unusable, so the socket keeps its default literal
 */
export type InputMatch = 'direct' | 'broadcast' | 'mismatch';

export function matchInputType(socket: InputSocket, producerType: DataType): InputMatch {
  if (socket.accepts === 'any' || socket.type === producerType) return 'direct';
  if (producerType === 'float') return 'broadcast';
  return 'mismatch';
}

/** Kind of the value that ends up on `socket` when fed a `producerType`. */
export function landedType(socket: InputSocket, producerType: DataType): DataType {
  return matchInputType(socket, producerType) === 'direct' ? producerType : socket.type;
}

/**
 * Value kind of one output socket. Fixed by the socket unless the
 * definition resolves it from what is wired in, via `probe`.
 */
export function resolveOutputType(
  def: NodeDefinition,
  node: GraphNode,
  outputKey: string,
  probe: InputTypeProbe,
): DataType {
  if (def.resolveOutputType) return def.resolveOutputType(node, outputKey, probe);
  return node.outputs[outputKey]?.type ?? def.outputs[outputKey]?.type ?? 'float';
}

/**
 * Resolve an output's kind outside a compile pass (e.g. to check a new link).
 * Walks upstream as far as it needs to; a producer already being resolved
 * further down the walk counts as unconnected.
 */
export function inferOutputType(graph: NodeGraph, nodeId: number, outputKey: string): DataType | undefined {
  const index = indexGraph(graph);
  const resolving = new Set<number>();

  const infer = (id: number, key: string): DataType | undefined => {
    const node = index.nodes.get(id);
    const def = node ? getNodeDefinition(node.type) : undefined;
    if (!node || !def || !Object.hasOwn(node.outputs, key)) return undefined;

    resolving.add(id);
    const probe: InputTypeProbe = inputKey => {
      const socket = node.inputs[inputKey];
      if (!socket) return 'float';
      const link = incomingLink(index, id, inputKey);
      if (!link || resolving.has(link.sourceNodeId)) return socket.type;
      const producerType = infer(link.sourceNodeId, link.sourceOutputKey);
      return producerType ? landedType(socket, producerType) : socket.type;
    };
    const type = resolveOutputType(def, node, key, probe);
    resolving.delete(id);
    return type;
  };

  return infer(nodeId, outputKey);
}
