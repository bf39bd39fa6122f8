import type { NodeDefinition } from '../../types/nodeGraph';
import { f3, numParam, vec3Str, vecParam } from './helpers';

// Fragment-stage built-ins the sources read. Declared by the shader prologue.
export const FRAG_POS = 'FragPos';
export const SURFACE_NORMAL = 'normalize(Normal)';

export const TimeNode: NodeDefinition = {
  type: 'time',
  label: 'Time',
  category: 'Input',
  description: 'Current time in seconds (uniform: time)',
  inputs: {},
  outputs: {
    time: { type: 'float', label: 'Time' },
  },
  generateGLSL: () => ({ time: 'time' }),
};

export const PositionNode: NodeDefinition = {
  type: 'position',
  label: 'Position',
  category: 'Input',
  description: 'World-space fragment position, whole or per axis',
  inputs: {},
  outputs: {
    xyz: { type: 'vec3',  label: 'XYZ' },
    x:   { type: 'float', label: 'X'   },
    y:   { type: 'float', label: 'Y'   },
    z:   { type: 'float', label: 'Z'   },
  },
  generateGLSL: () => ({
    xyz: FRAG_POS,
    x: `${FRAG_POS}.x`,
    y: `${FRAG_POS}.y`,
    z: `${FRAG_POS}.z`,
  }),
};

export const NormalNode: NodeDefinition = {
  type: 'normal',
  label: 'Normal',
  category: 'Input',
  description: 'Surface normal',
  inputs: {},
  outputs: {
    normal: { type: 'vec3', label: 'Normal' },
  },
  generateGLSL: () => ({ normal: SURFACE_NORMAL }),
};

export const FresnelNode: NodeDefinition = {
  type: 'fresnel',
  label: 'Fresnel',
  category: 'Input',
  description: 'View-angle falloff: (1 - max(N·V, 0)) ^ power',
  inputs: {
    power: { type: 'float', label: 'Power', defaultValue: '2.0' },
  },
  outputs: {
    factor: { type: 'float', label: 'Factor' },
  },
  generateGLSL: (_node, inputVars) => ({
    factor: `pow(1.0 - max(dot(${SURFACE_NORMAL}, normalize(viewPos - ${FRAG_POS})), 0.0), ${inputVars.power})`,
  }),
};

export const FloatNode: NodeDefinition = {
  type: 'float',
  label: 'Float',
  category: 'Constants',
  description: 'A constant float value',
  inputs: {},
  outputs: {
    value: { type: 'float', label: 'Value' },
  },
  defaultParams: { value: 0.0 },
  paramDefs: {
    value: { label: 'Value', type: 'float', min: -100, max: 100, step: 0.01 },
  },
  generateGLSL: node => ({ value: f3(numParam(node, 'value', 0.0)) }),
};

export const ColorNode: NodeDefinition = {
  type: 'color',
  label: 'Color',
  category: 'Constants',
  description: 'A constant RGB color',
  inputs: {},
  outputs: {
    rgb: { type: 'vec3', label: 'RGB' },
  },
  defaultParams: { color: [1.0, 0.5, 0.2] },
  paramDefs: {
    color: { label: 'Color', type: 'vec3', min: 0, max: 1, step: 0.01 },
  },
  generateGLSL: node => ({ rgb: vec3Str(vecParam(node, 'color', [1.0, 0.5, 0.2])) }),
};
