import type { CompileDiagnostic, NodeGraph, UniformParameter } from '../types/nodeGraph';
import { getNodeDefinition } from '../nodes/definitions';

export interface UniformCollection {
  /** Declaration order = node order in the graph */
  uniforms: UniformParameter[];
  /** parameter nodeId → uniform identifier */
  names: Map<number, string>;
}

// `u_` keeps user uniforms clear of the built-ins; GLSL reserves "__"
export function uniformIdentifier(paramName: string): string {
  const body = paramName
    .trim()
    .replace(/[^A-Za-z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
  return `u_${body || 'param'}`;
}

/**
 * Declares a uniform for every parameter node in the graph, wired or not,
 * so a parameter keeps its binding slot while it is disconnected.
 */
export function collectUniforms(graph: NodeGraph, diagnostics: CompileDiagnostic[] = []): UniformCollection {
  const uniforms: UniformParameter[] = [];
  const names = new Map<number, string>();
  const taken = new Set<string>();

  for (const node of graph.nodes) {
    const declare = getNodeDefinition(node.type)?.uniform;
    if (!declare) continue;

    const { paramName, label, type, value } = declare(node);
    let name = uniformIdentifier(paramName);
    if (taken.has(name)) {
      // The suffixed name may itself belong to another parameter
      let renamed = `${name}_${node.id}`;
      while (taken.has(renamed)) renamed += `_${node.id}`;
      diagnostics.push({
        kind: 'duplicate-uniform',
        message: `Uniform "${name}" is already declared; node ${node.id} uses "${renamed}"`,
        nodeId: node.id,
      });
      name = renamed;
    }
    taken.add(name);
    names.set(node.id, name);
    uniforms.push({ name, label, type, value });
  }

  return { uniforms, names };
}
