import type { DataType, GraphNode, InputSocket, NodeDefinition } from '../../types/nodeGraph';

// Helper: emit a number as a GLSL float literal (e.g. 5 → "5.0")
export function f(n: number): string {
  return Number.isInteger(n) ? `${n}.0` : `${n}`;
}

// Helper: emit a number as a fixed three-decimal GLSL float literal (e.g. 1 → "1.000")
export function f3(n: number): string {
  return n.toFixed(3);
}

// Helper: emit a vec3 literal
export function vec3Str(v: number[]): string {
  return `vec3(${v.map(f3).join(', ')})`;
}

// Number of components per type
export const COMPONENTS: Record<DataType, number> = {
  float: 1,
  vec2: 2,
  vec3: 3,
  vec4: 4,
};

export function isVectorType(type: DataType): boolean {
  return type !== 'float';
}

/** Widest vector kind among `types`, or float when none is a vector. */
export function widestType(types: DataType[]): DataType {
  return types.reduce<DataType>(
    (widest, t) => (COMPONENTS[t] > COMPONENTS[widest] ? t : widest),
    'float',
  );
}

/**
 * Whether a producer of `sourceType` may be wired into `target`: same kind,
 * an any-kind socket, or a float broadcast over a vector socket.
 */
export function isConnectionCompatible(sourceType: DataType, target: InputSocket): boolean {
  return target.accepts === 'any' || target.type === sourceType || sourceType === 'float';
}

// Read a numeric param, falling back when it is missing or not a number
export function numParam(node: GraphNode, key: string, fallback: number): number {
  const v = node.params[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : fallback;
}

// Read a finite numeric array param of exactly `length` components
export function vecParam(node: GraphNode, key: string, fallback: number[]): number[] {
  const v = node.params[key];
  if (Array.isArray(v) && v.length === fallback.length && v.every(n => typeof n === 'number' && Number.isFinite(n))) {
    return v.map(n => Number(n));
  }
  return fallback;
}

export function isDataType(v: unknown): v is DataType {
  return v === 'float' || v === 'vec2' || v === 'vec3' || v === 'vec4';
}

export type NodeRegistry = Record<string, NodeDefinition>;
