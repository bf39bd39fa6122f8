import type { GraphNode, InputSocket, OutputSocket } from '../types/nodeGraph';
import { getNodeDefinition, vectorParamType } from './definitions';

/** Build a fresh node instance from its definition. */
export function instantiateNode(
  id: number,
  type: string,
  position: { x: number; y: number },
  overrideParams: Record<string, unknown> = {},
): GraphNode | null {
  const def = getNodeDefinition(type);
  if (!def) return null;

  return conformToDefinition({
    id,
    type,
    position,
    inputs: {},
    outputs: {},
    params: { ...structuredClone(def.defaultParams ?? {}), ...overrideParams },
  });
}

// Sockets whose kind is chosen by a param
export function syncDynamicSockets(node: GraphNode): GraphNode {
  if (node.type !== 'vectorParam' || !node.outputs.value) return node;
  return { ...node, outputs: { ...node.outputs, value: { ...node.outputs.value, type: vectorParamType(node) } } };
}

/**
 * Sockets of a stored node replaced by fresh copies of its definition's, so
 * keys, defaults and kinds always match what `generateGLSL` reads. Nodes of an
 * unknown type come back unchanged.
 */
export function conformToDefinition(node: GraphNode): GraphNode {
  const def = getNodeDefinition(node.type);
  if (!def) return node;

  const inputs: Record<string, InputSocket> = {};
  for (const [key, socket] of Object.entries(def.inputs)) inputs[key] = { ...socket };
  const outputs: Record<string, OutputSocket> = {};
  for (const [key, socket] of Object.entries(def.outputs)) outputs[key] = { ...socket };

  return syncDynamicSockets({ ...node, inputs, outputs });
}
