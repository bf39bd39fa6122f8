import type {
  CompileDiagnostic,
  DataType,
  GenerateContext,
  GraphNode,
  InputTypeProbe,
  NodeGraph,
  UniformParameter,
} from '../types/nodeGraph';
import { getNodeDefinition, OutputNode, OUTPUT_NODE_TYPE } from '../nodes/definitions';
import { createLogger } from '../utils/logger';
import { indexGraph, incomingLink, type GraphIndex } from './graphIndex';
import { collectReachable } from './reachability';
import { topologicalSort } from './topologicalSort';
import { countFanOut } from './fanOut';
import { matchInputType, resolveOutputType } from './typeResolver';
import { collectUniforms, uniformIdentifier } from './uniforms';
import { assembleFragmentShader, FALLBACK_COLOR, VERTEX_SHADER, type Rgba } from './shaderAssembler';

export interface CompileOptions {
  /** Log each compile pass to the console */
  verbose?: boolean;
  /** Color written when the graph has no Output node */
  fallbackColor?: Rgba;
}

export const DEFAULT_COMPILE_OPTIONS: Required<CompileOptions> = {
  verbose: false,
  fallbackColor: FALLBACK_COLOR,
};

export interface CompilationResult {
  vertexShader: string;
  fragmentShader: string;
  /** False only if compilation hit an internal error; the fallback shader is returned then */
  success: boolean;
  /** Temporary declarations emitted into main(), in order */
  statements: string[];
  /** User uniforms to bind, in declaration order */
  uniforms: UniformParameter[];
  /** Non-fatal findings: broken cycles, dangling links, type mismatches, … */
  diagnostics: CompileDiagnostic[];
  /**
   * Maps nodeId → { outputKey → GLSL expression or temporary } for every
   * output that was consumed on the way to the Output node.
   */
  nodeOutputVars: Map<number, Record<string, string>>;
}

// Expression registered for one output socket, with its propagated kind
interface ResolvedOutput {
  expr: string;
  type: DataType;
}

interface ResolvedInputs {
  vars: Record<string, string>;
  types: Record<string, DataType>;
}

export function compileGraph(graph: NodeGraph, options: CompileOptions = {}): CompilationResult {
  const config = { ...DEFAULT_COMPILE_OPTIONS, ...options };
  const log = createLogger('graphCompiler', { verbose: config.verbose });
  const diagnostics: CompileDiagnostic[] = [];

  try {
    // Uniforms come from every parameter node, wired or not
    const { uniforms, names } = collectUniforms(graph, diagnostics);

    const sinks = graph.nodes.filter(n => n.type === OUTPUT_NODE_TYPE);
    if (sinks.length === 0) {
      diagnostics.push({ kind: 'missing-output', message: 'Graph has no Output node; writing the fallback color' });
      log.debug('no Output node, emitting fallback color');
      return {
        vertexShader: VERTEX_SHADER,
        fragmentShader: assembleFragmentShader(uniforms, { statements: [], output: null }, config.fallbackColor),
        success: true,
        statements: [],
        uniforms,
        diagnostics,
        nodeOutputVars: new Map(),
      };
    }
    const [firstSink] = sinks;
    if (sinks.length > 1) {
      diagnostics.push({
        kind: 'multiple-outputs',
        message: `Graph has ${sinks.length} Output nodes; using node ${firstSink.id}`,
        nodeId: firstSink.id,
      });
    }

    const index = indexGraph(graph, diagnostics);
    const sink = index.nodes.get(firstSink.id) ?? firstSink;
    const reachable = collectReachable(index, sink.id);
    const { order, brokenLinks } = topologicalSort(index, reachable);
    for (const link of brokenLinks) {
      diagnostics.push({
        kind: 'cycle',
        message: `Link ${link.sourceNodeId}.${link.sourceOutputKey} → ${link.targetNodeId}.${link.targetInputKey} closes a cycle; input "${link.targetInputKey}" uses its default`,
        nodeId: link.targetNodeId,
      });
    }
    const { counts, consumedOutputs } = countFanOut(index, order);

    const context: GenerateContext = {
      uniformName: nodeId => names.get(nodeId) ?? uniformIdentifier('param'),
    };
    const resolved = new Map<number, Record<string, ResolvedOutput>>();
    const statements: string[] = [];
    let tempCounter = 0;

    for (const node of order) {
      if (node.id === sink.id) continue;

      const def = getNodeDefinition(node.type);
      if (!def) {
        diagnostics.push({
          kind: 'unknown-node-type',
          message: `Unknown node type "${node.type}"; inputs reading node ${node.id} use their defaults`,
          nodeId: node.id,
        });
        continue;
      }

      const inputs = resolveInputs(node, index, resolved, diagnostics);
      const expressions = def.generateGLSL(node, inputs.vars, context);
      const probe: InputTypeProbe = key => inputs.types[key] ?? node.inputs[key]?.type ?? 'float';

      // Pure sources read once are inlined; everything else gets a temporary
      const inline = Object.keys(node.inputs).length === 0 && (counts.get(node.id) ?? 0) <= 1;
      const outputs: Record<string, ResolvedOutput> = {};

      for (const outputKey of Object.keys(node.outputs)) {
        if (!consumedOutputs.get(node.id)?.has(outputKey)) continue;
        const expr = expressions[outputKey];
        if (expr === undefined) continue;

        const type = resolveOutputType(def, node, outputKey, probe);
        if (inline) {
          outputs[outputKey] = { expr, type };
        } else {
          const name = `tmp${tempCounter++}`;
          statements.push(`${type} ${name} = ${expr};`);
          outputs[outputKey] = { expr: name, type };
        }
      }
      resolved.set(node.id, outputs);
    }

    const sinkInputs = resolveInputs(sink, index, resolved, diagnostics);
    const output = {
      color: sinkInputs.vars.color ?? OutputNode.inputs.color.defaultValue,
      alpha: sinkInputs.vars.alpha ?? OutputNode.inputs.alpha.defaultValue,
    };

    log.debug(
      `${order.length} reachable node(s) of ${graph.nodes.length}, ${statements.length} temporar${statements.length === 1 ? 'y' : 'ies'}, ${uniforms.length} uniform(s)`,
    );

    const nodeOutputVars = new Map<number, Record<string, string>>();
    for (const [nodeId, outputs] of resolved) {
      nodeOutputVars.set(
        nodeId,
        Object.fromEntries(Object.entries(outputs).map(([key, out]) => [key, out.expr])),
      );
    }

    return {
      vertexShader: VERTEX_SHADER,
      fragmentShader: assembleFragmentShader(uniforms, { statements, output }, config.fallbackColor),
      success: true,
      statements,
      uniforms,
      diagnostics,
      nodeOutputVars,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    log.error('compilation failed:', message);
    diagnostics.push({ kind: 'internal-error', message });
    return {
      vertexShader: VERTEX_SHADER,
      fragmentShader: assembleFragmentShader([], { statements: [], output: null }, config.fallbackColor),
      success: false,
      statements: [],
      uniforms: [],
      diagnostics,
      nodeOutputVars: new Map(),
    };
  }
}

/**
 * Expression and kind for each of the node's inputs: the producer's
 * registered value (broadcast from float where a vector is expected), or the
 * socket's default when the producer is unresolved or of the wrong kind.
 */
function resolveInputs(
  node: GraphNode,
  index: GraphIndex,
  resolved: Map<number, Record<string, ResolvedOutput>>,
  diagnostics: CompileDiagnostic[],
): ResolvedInputs {
  const vars: Record<string, string> = {};
  const types: Record<string, DataType> = {};

  for (const [inputKey, socket] of Object.entries(node.inputs)) {
    vars[inputKey] = socket.defaultValue;
    types[inputKey] = socket.type;

    const link = incomingLink(index, node.id, inputKey);
    const source = link ? resolved.get(link.sourceNodeId)?.[link.sourceOutputKey] : undefined;
    if (!source) continue;

    switch (matchInputType(socket, source.type)) {
      case 'direct':
        vars[inputKey] = source.expr;
        types[inputKey] = source.type;
        break;
      case 'broadcast':
        vars[inputKey] = `${socket.type}(${source.expr})`;
        break;
      case 'mismatch':
        diagnostics.push({
          kind: 'type-mismatch',
          message: `Node ${node.id}: input "${inputKey}" expects ${socket.type}, got ${source.type}; using its default`,
          nodeId: node.id,
        });
        break;
    }
  }

  return { vars, types };
}
