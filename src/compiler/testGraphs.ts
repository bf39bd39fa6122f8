import type { GraphLink, GraphNode, NodeGraph } from '../types/nodeGraph';
import { instantiateNode } from '../nodes/instantiate';

// Builders shared by the compiler and store tests

export function node(id: number, type: string, params: Record<string, unknown> = {}): GraphNode {
  const built = instantiateNode(id, type, { x: 0, y: 0 }, params);
  if (!built) throw new Error(`Unknown node type in test graph: ${type}`);
  return built;
}

export function link(sourceNodeId: number, sourceOutputKey: string, targetNodeId: number, targetInputKey: string): GraphLink {
  return { sourceNodeId, sourceOutputKey, targetNodeId, targetInputKey };
}

export function graph(nodes: GraphNode[], links: GraphLink[] = []): NodeGraph {
  return { nodes, links };
}

/** Lines of the fragment shader's main() body, indentation included. */
export function mainBody(fragmentShader: string): string[] {
  const lines = fragmentShader.split('\n');
  return lines.slice(lines.indexOf('{') + 1, lines.lastIndexOf('}'));
}
