import type { NodeDefinition } from '../../types/nodeGraph';

export const MakeVec3Node: NodeDefinition = {
  type: 'makeVec3', label: 'Make Vec3', category: 'Vector', description: 'Build a vec3 from three floats',
  inputs: {
    x: { type: 'float', label: 'X', defaultValue: '0.0' },
    y: { type: 'float', label: 'Y', defaultValue: '0.0' },
    z: { type: 'float', label: 'Z', defaultValue: '0.0' },
  },
  outputs: { vec: { type: 'vec3', label: 'Vec3' } },
  generateGLSL: (_node, inputVars) => ({ vec: `vec3(${inputVars.x}, ${inputVars.y}, ${inputVars.z})` }),
};

export const SplitVec3Node: NodeDefinition = {
  type: 'splitVec3', label: 'Split Vec3', category: 'Vector', description: 'Extract the X, Y and Z components of a vec3',
  inputs: { vec: { type: 'vec3', label: 'Vec3', defaultValue: 'vec3(0.0)' } },
  outputs: {
    x: { type: 'float', label: 'X' },
    y: { type: 'float', label: 'Y' },
    z: { type: 'float', label: 'Z' },
  },
  generateGLSL: (_node, inputVars) => ({
    x: `(${inputVars.vec}).x`,
    y: `(${inputVars.vec}).y`,
    z: `(${inputVars.vec}).z`,
  }),
};
