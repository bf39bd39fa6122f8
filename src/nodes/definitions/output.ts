import type { NodeDefinition } from '../../types/nodeGraph';

export const OUTPUT_NODE_TYPE = 'output';

// The sink. Its resolved inputs are written out by the shader assembler.
export const OutputNode: NodeDefinition = {
  type: OUTPUT_NODE_TYPE,
  label: 'Shader Output',
  category: 'Output',
  description: 'Final color and alpha of the fragment',
  inputs: {
    color: { type: 'vec3',  label: 'Color', defaultValue: 'vec3(1.0, 0.5, 0.2)' },
    alpha: { type: 'float', label: 'Alpha', defaultValue: '1.0' },
  },
  outputs: {},
  generateGLSL: () => ({}),
};
