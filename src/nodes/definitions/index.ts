// ─── Node Definitions: thin aggregator ───────────────────────────────────────
// Each category lives in its own file. This module re-exports everything and
// builds the unified NODE_REGISTRY consumed by the compiler and the store.

import type { NodeDefinition } from '../../types/nodeGraph';
import type { NodeRegistry } from './helpers';

// Input & constants
export { TimeNode, PositionNode, NormalNode, FresnelNode, FloatNode, ColorNode } from './sources';

// Math
export {
  AddNode, SubtractNode, MultiplyNode, DivideNode,
  SinNode, CosNode, AbsNode, MixNode, ClampNode,
} from './math';

// Vector
export { MakeVec3Node, SplitVec3Node } from './vector';

// Parameters
export { FloatParamNode, VectorParamNode, vectorParamType } from './parameters';

// Output
export { OutputNode, OUTPUT_NODE_TYPE } from './output';

// ─── Registry ─────────────────────────────────────────────────────────────────

import { TimeNode, PositionNode, NormalNode, FresnelNode, FloatNode, ColorNode } from './sources';
import {
  AddNode, SubtractNode, MultiplyNode, DivideNode,
  SinNode, CosNode, AbsNode, MixNode, ClampNode,
} from './math';
import { MakeVec3Node, SplitVec3Node } from './vector';
import { FloatParamNode, VectorParamNode } from './parameters';
import { OutputNode } from './output';

export const NODE_REGISTRY: NodeRegistry = {
  // Input
  time: TimeNode,
  position: PositionNode,
  normal: NormalNode,
  fresnel: FresnelNode,
  // Constants
  float: FloatNode,
  color: ColorNode,
  // Math
  add: AddNode,
  subtract: SubtractNode,
  multiply: MultiplyNode,
  divide: DivideNode,
  sin: SinNode,
  cos: CosNode,
  abs: AbsNode,
  mix: MixNode,
  clamp: ClampNode,
  // Vector
  makeVec3: MakeVec3Node,
  splitVec3: SplitVec3Node,
  // Parameters
  floatParam: FloatParamNode,
  vectorParam: VectorParamNode,
  // Output
  output: OutputNode,
};

export function getNodeDefinition(type: string): NodeDefinition | undefined {
  return Object.hasOwn(NODE_REGISTRY, type) ? NODE_REGISTRY[type] : undefined;
}

export function getNodesByCategory(category: string): NodeDefinition[] {
  return Object.values(NODE_REGISTRY).filter(n => n.category === category);
}

export function getAllCategories(): string[] {
  return [...new Set(Object.values(NODE_REGISTRY).map(n => n.category))];
}
