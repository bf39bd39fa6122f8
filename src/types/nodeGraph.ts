// Data types that flow between nodes
export type DataType = 'float' | 'vec2' | 'vec3' | 'vec4';

// Socket (connection point on a node)
export interface Socket {
  type: DataType;
  label: string;
}

// Which producers an input socket will take a link from
export type ConnectionFilter = 'same' | 'any';

// Input socket with its fallback literal
export interface InputSocket extends Socket {
  /** GLSL literal used while the socket is unconnected */
  defaultValue: string;
  accepts?: ConnectionFilter;
}

// Output socket
export interface OutputSocket extends Socket {}

// Runtime node instance
export interface GraphNode {
  id: number;
  type: string;
  position: { x: number; y: number };
  inputs: Record<string, InputSocket>;
  outputs: Record<string, OutputSocket>;
  params: Record<string, unknown>;
}

// Directed edge: output socket → input socket
export interface GraphLink {
  sourceNodeId: number;
  sourceOutputKey: string;
  targetNodeId: number;
  targetInputKey: string;
}

// Editable parameter definition (drives the inline controls of a host UI)
export interface ParamDef {
  label: string;
  type: 'float' | 'vec3' | 'select' | 'string';
  min?: number;
  max?: number;
  step?: number;
  options?: { value: string; label: string }[];
}

/**
 * Looks up the value kind arriving on one of the node's inputs: the kind of
 * the immediately connected producer, or the socket's own kind when it falls
 * back to its default literal.
 */
export type InputTypeProbe = (inputKey: string) => DataType;

export type UniformValue = number | number[];

// User-exposed uniform, derived from a parameter node on every compile
export interface UniformParameter {
  name: string;
  label: string;
  type: DataType;
  value: UniformValue;
}

// What a parameter node asks for before its name is made a GLSL identifier
export interface UniformDeclaration {
  paramName: string;
  label: string;
  type: DataType;
  value: UniformValue;
}

// Per-compile lookups available to expression templates
export interface GenerateContext {
  /** GLSL identifier assigned to a parameter node's uniform */
  uniformName: (nodeId: number) => string;
}

// Node definition (blueprint)
export interface NodeDefinition {
  type: string;
  label: string;
  category: string;
  description?: string;

  inputs: Record<string, InputSocket>;
  outputs: Record<string, OutputSocket>;

  /**
   * GLSL expression for every output socket, built from the resolved
   * expressions of the node's inputs.
   */
  generateGLSL: (
    node: GraphNode,
    inputVars: Record<string, string>,
    context: GenerateContext,
  ) => Record<string, string>;

  // Value kind of an output that depends on what is wired into the node
  resolveOutputType?: (node: GraphNode, outputKey: string, probe: InputTypeProbe) => DataType;

  // Parameter nodes declare a uniform whether or not they are wired
  uniform?: (node: GraphNode) => UniformDeclaration;

  // Default parameter values
  defaultParams?: Record<string, unknown>;

  paramDefs?: Record<string, ParamDef>;
}

// The entire graph
export interface NodeGraph {
  nodes: GraphNode[];
  links: GraphLink[];
}

export type DiagnosticKind =
  | 'missing-output'
  | 'multiple-outputs'
  | 'cycle'
  | 'unknown-node-type'
  | 'dangling-link'
  | 'type-mismatch'
  | 'duplicate-uniform'
  | 'internal-error';

// Non-fatal finding reported alongside the compiled shader
export interface CompileDiagnostic {
  kind: DiagnosticKind;
  message: string;
  nodeId?: number;
}
