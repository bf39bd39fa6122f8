export type {
  DataType,
  Socket,
  InputSocket,
  OutputSocket,
  ConnectionFilter,
  GraphNode,
  GraphLink,
  NodeGraph,
  NodeDefinition,
  UniformParameter,
  UniformValue,
  CompileDiagnostic,
  DiagnosticKind,
} from './types/nodeGraph';

export {
  compileGraph,
  DEFAULT_COMPILE_OPTIONS,
  type CompileOptions,
  type CompilationResult,
} from './compiler/graphCompiler';
export { collectReachable } from './compiler/reachability';
export { topologicalSort, type TopologicalOrder } from './compiler/topologicalSort';
export { countFanOut, type FanOut } from './compiler/fanOut';
export { resolveOutputType, inferOutputType, matchInputType } from './compiler/typeResolver';
export { collectUniforms, uniformIdentifier } from './compiler/uniforms';
export {
  assembleFragmentShader,
  BUILTIN_UNIFORMS,
  FALLBACK_COLOR,
  VERTEX_SHADER,
  type Rgba,
} from './compiler/shaderAssembler';
export { indexGraph, type GraphIndex } from './compiler/graphIndex';

export { NODE_REGISTRY, getNodeDefinition, getNodesByCategory, getAllCategories } from './nodes/definitions';

export { createNodeGraphStore, type NodeGraphStore, type NodeGraphState } from './store/nodeGraphStore';
export { parseGraphSnapshot, serializeGraph, GraphSnapshotSchema } from './utils/graphSchema';
