import type { DataType, GraphNode, NodeDefinition, UniformDeclaration } from '../../types/nodeGraph';
import { COMPONENTS, isDataType, isVectorType, numParam, vecParam } from './helpers';

function stringParam(node: GraphNode, key: string, fallback: string): string {
  const v = node.params[key];
  return typeof v === 'string' && v.trim() !== '' ? v : fallback;
}

/** Vector kind chosen on a vector parameter node; vec3 unless a valid vector kind is set. */
export function vectorParamType(node: GraphNode): DataType {
  const t = node.params.valueType;
  return isDataType(t) && isVectorType(t) ? t : 'vec3';
}

export const FloatParamNode: NodeDefinition = {
  type: 'floatParam',
  label: 'Float Parameter',
  category: 'Parameters',
  description: 'A float uniform set from outside the shader',
  inputs: {},
  outputs: {
    value: { type: 'float', label: 'Value' },
  },
  defaultParams: { name: 'param', label: 'Param', value: 0.5 },
  paramDefs: {
    name: { label: 'Uniform name', type: 'string' },
    label: { label: 'Label', type: 'string' },
    value: { label: 'Value', type: 'float', step: 0.01 },
  },
  generateGLSL: (node, _inputVars, context) => ({ value: context.uniformName(node.id) }),
  uniform: (node): UniformDeclaration => {
    const paramName = stringParam(node, 'name', 'param');
    return {
      paramName,
      label: stringParam(node, 'label', paramName),
      type: 'float',
      value: numParam(node, 'value', 0.5),
    };
  },
};

export const VectorParamNode: NodeDefinition = {
  type: 'vectorParam',
  label: 'Vector Parameter',
  category: 'Parameters',
  description: 'A vec2 / vec3 / vec4 uniform set from outside the shader',
  inputs: {},
  outputs: {
    value: { type: 'vec3', label: 'Value' },
  },
  defaultParams: { name: 'vector', label: 'Vector', valueType: 'vec3', value: [0.0, 0.0, 0.0] },
  paramDefs: {
    name: { label: 'Uniform name', type: 'string' },
    label: { label: 'Label', type: 'string' },
    valueType: {
      label: 'Type',
      type: 'select',
      options: [
        { value: 'vec2', label: 'vec2' },
        { value: 'vec3', label: 'vec3' },
        { value: 'vec4', label: 'vec4' },
      ],
    },
  },
  resolveOutputType: node => vectorParamType(node),
  generateGLSL: (node, _inputVars, context) => ({ value: context.uniformName(node.id) }),
  uniform: (node): UniformDeclaration => {
    const type = vectorParamType(node);
    const paramName = stringParam(node, 'name', 'vector');
    return {
      paramName,
      label: stringParam(node, 'label', paramName),
      type,
      value: vecParam(node, 'value', new Array<number>(COMPONENTS[type]).fill(0)),
    };
  },
};
