import type { NodeDefinition, GraphNode, InputTypeProbe } from '../../types/nodeGraph';
import { f3, numParam, widestType } from './helpers';

export const AddNode: NodeDefinition = {
  type: 'add', label: 'Add', category: 'Math', description: 'Add two float values (a + b)',
  inputs: { a: { type: 'float', label: 'A', defaultValue: '0.0' }, b: { type: 'float', label: 'B', defaultValue: '0.0' } },
  outputs: { result: { type: 'float', label: 'Result' } },
  generateGLSL: (_node, inputVars) => ({ result: `(${inputVars.a} + ${inputVars.b})` }),
};

export const SubtractNode: NodeDefinition = {
  type: 'subtract', label: 'Subtract', category: 'Math', description: 'Subtract b from a (a - b)',
  inputs: { a: { type: 'float', label: 'A', defaultValue: '0.0' }, b: { type: 'float', label: 'B', defaultValue: '0.0' } },
  outputs: { result: { type: 'float', label: 'Result' } },
  generateGLSL: (_node, inputVars) => ({ result: `(${inputVars.a} - ${inputVars.b})` }),
};

/**
 * The one polymorphic operator: either side takes any kind, so a float can
 * scale a vector. The result is as wide as the widest vector wired in.
 */
export const MultiplyNode: NodeDefinition = {
  type: 'multiply', label: 'Multiply', category: 'Math', description: 'Multiply two values (a × b). Scalar × vector widens to the vector.',
  inputs: {
    a: { type: 'float', label: 'A', defaultValue: '1.0', accepts: 'any' },
    b: { type: 'float', label: 'B', defaultValue: '1.0', accepts: 'any' },
  },
  outputs: { result: { type: 'float', label: 'Result' } },
  resolveOutputType: (_node: GraphNode, _outputKey: string, probe: InputTypeProbe) => widestType([probe('a'), probe('b')]),
  generateGLSL: (_node, inputVars) => ({ result: `(${inputVars.a} * ${inputVars.b})` }),
};

export const DivideNode: NodeDefinition = {
  type: 'divide', label: 'Divide', category: 'Math', description: 'Divide a by b (a / b). No guard against zero.',
  inputs: { a: { type: 'float', label: 'A', defaultValue: '1.0' }, b: { type: 'float', label: 'B', defaultValue: '1.0' } },
  outputs: { result: { type: 'float', label: 'Result' } },
  generateGLSL: (_node, inputVars) => ({ result: `(${inputVars.a} / ${inputVars.b})` }),
};

export const SinNode: NodeDefinition = {
  type: 'sin', label: 'Sin', category: 'Math', description: 'sin(x)',
  inputs: { x: { type: 'float', label: 'X', defaultValue: '0.0' } },
  outputs: { result: { type: 'float', label: 'Result' } },
  generateGLSL: (_node, inputVars) => ({ result: `sin(${inputVars.x})` }),
};

export const CosNode: NodeDefinition = {
  type: 'cos', label: 'Cos', category: 'Math', description: 'cos(x)',
  inputs: { x: { type: 'float', label: 'X', defaultValue: '0.0' } },
  outputs: { result: { type: 'float', label: 'Result' } },
  generateGLSL: (_node, inputVars) => ({ result: `cos(${inputVars.x})` }),
};

export const AbsNode: NodeDefinition = {
  type: 'abs', label: 'Abs', category: 'Math', description: 'abs(x)',
  inputs: { x: { type: 'float', label: 'X', defaultValue: '0.0' } },
  outputs: { result: { type: 'float', label: 'Result' } },
  generateGLSL: (_node, inputVars) => ({ result: `abs(${inputVars.x})` }),
};

export const MixNode: NodeDefinition = {
  type: 'mix', label: 'Mix', category: 'Math', description: 'Linear interpolation: mix(a, b, t)',
  inputs: {
    a: { type: 'float', label: 'A', defaultValue: '0.0' },
    b: { type: 'float', label: 'B', defaultValue: '1.0' },
    t: { type: 'float', label: 'T', defaultValue: '0.5' },
  },
  outputs: { result: { type: 'float', label: 'Result' } },
  generateGLSL: (_node, inputVars) => ({ result: `mix(${inputVars.a}, ${inputVars.b}, ${inputVars.t})` }),
};

// Bounds are node params, not sockets
export const ClampNode: NodeDefinition = {
  type: 'clamp', label: 'Clamp', category: 'Math', description: 'clamp(x, min, max) with min/max set on the node',
  inputs: { x: { type: 'float', label: 'X', defaultValue: '0.0' } },
  outputs: { result: { type: 'float', label: 'Result' } },
  defaultParams: { min: 0.0, max: 1.0 },
  paramDefs: {
    min: { label: 'Min', type: 'float', step: 0.01 },
    max: { label: 'Max', type: 'float', step: 0.01 },
  },
  generateGLSL: (node, inputVars) => {
    const lo = f3(numParam(node, 'min', 0.0));
    const hi = f3(numParam(node, 'max', 1.0));
    return { result: `clamp(${inputVars.x}, ${lo}, ${hi})` };
  },
};
