import { createStore } from 'zustand/vanilla';
import type {
  CompileDiagnostic,
  GraphLink,
  GraphNode,
  NodeGraph,
  UniformParameter,
} from '../types/nodeGraph';
import { OUTPUT_NODE_TYPE } from '../nodes/definitions';
import { conformToDefinition, instantiateNode, syncDynamicSockets } from '../nodes/instantiate';
import { isConnectionCompatible } from '../nodes/definitions/helpers';
import { compileGraph, type CompileOptions } from '../compiler/graphCompiler';
import { inferOutputType } from '../compiler/typeResolver';
import { parseGraphSnapshot, serializeGraph } from '../utils/graphSchema';
import { openTextFile, saveTextFile } from '../utils/fileIO';
import { createLogger } from '../utils/logger';

// ── Undo history ──────────────────────────────────────────────────────────────
const MAX_HISTORY = 50;

interface GraphSnapshot {
  nodes: GraphNode[];
  links: GraphLink[];
}

export interface NodeGraphState {
  // Graph data
  nodes: GraphNode[];
  links: GraphLink[];
  /** Next id handed out by addNode; ids are never reused within a store */
  nextNodeId: number;

  // Last compile
  vertexShader: string;
  fragmentShader: string;
  uniforms: UniformParameter[];
  diagnostics: CompileDiagnostic[];
  /** Maps nodeId → { outputKey → glslVarName }, updated on every compile */
  nodeOutputVarMap: Map<number, Record<string, string>>;

  /** Validation errors from the last failed import */
  importErrors: string[];

  // Actions
  addNode: (type: string, position?: { x: number; y: number }, overrideParams?: Record<string, unknown>) => number | null;
  removeNode: (nodeId: number) => void;
  updateNodePosition: (nodeId: number, position: { x: number; y: number }) => void;
  updateNodeParams: (nodeId: number, params: Record<string, unknown>) => void;

  connectNodes: (
    sourceNodeId: number,
    sourceOutputKey: string,
    targetNodeId: number,
    targetInputKey: string
  ) => boolean;

  disconnectInput: (nodeId: number, inputKey: string) => void;

  undo: () => void;
  compile: () => void;
  loadDefaultGraph: () => void;
  getGraph: () => NodeGraph;

  // Save / Load
  exportGraph: () => string;
  importGraph: (json: string) => boolean;
  saveGraphToFile: (path: string) => Promise<void>;
  loadGraphFromFile: (path: string) => Promise<boolean>;
}

function cloneSnapshot(nodes: GraphNode[], links: GraphLink[]): GraphSnapshot {
  return structuredClone({ nodes, links });
}

function nextIdAfter(nodes: GraphNode[]): number {
  return nodes.reduce((next, n) => Math.max(next, n.id + 1), 0);
}

export type NodeGraphStore = ReturnType<typeof createNodeGraphStore>;

/**
 * Headless host for a shader graph: owns nodes and links, applies edits and
 * recompiles after every structural or parameter change.
 */
export function createNodeGraphStore(compileOptions: CompileOptions = {}) {
  const log = createLogger('nodeGraphStore', { verbose: compileOptions.verbose });
  const history: GraphSnapshot[] = [];

  /** Push a deep-clone of the current graph onto the undo stack. */
  const pushHistory = (nodes: GraphNode[], links: GraphLink[]) => {
    history.push(cloneSnapshot(nodes, links));
    if (history.length > MAX_HISTORY) history.shift();
  };

  return createStore<NodeGraphState>((set, get) => ({
    nodes: [],
    links: [],
    nextNodeId: 0,
    vertexShader: '',
    fragmentShader: '',
    uniforms: [],
    diagnostics: [],
    nodeOutputVarMap: new Map(),
    importErrors: [],

    getGraph: () => ({ nodes: get().nodes, links: get().links }),

    undo: () => {
      const prev = history.pop();
      if (!prev) return;
      // Ids handed out after the snapshot stay retired
      set(state => ({ nodes: prev.nodes, links: prev.links, nextNodeId: Math.max(state.nextNodeId, nextIdAfter(prev.nodes)) }));
      get().compile();
    },

    addNode: (type, position = { x: 0, y: 0 }, overrideParams) => {
      const { nodes, links, nextNodeId } = get();
      if (type === OUTPUT_NODE_TYPE && nodes.some(n => n.type === OUTPUT_NODE_TYPE)) {
        log.warn('Graph already has an Output node');
        return null;
      }
      const node = instantiateNode(nextNodeId, type, position, overrideParams);
      if (!node) {
        log.error(`Unknown node type: ${type}`);
        return null;
      }

      pushHistory(nodes, links);
      set(state => ({ nodes: [...state.nodes, node], nextNodeId: state.nextNodeId + 1 }));
      get().compile();
      return node.id;
    },

    removeNode: (nodeId) => {
      const { nodes, links } = get();
      if (!nodes.some(n => n.id === nodeId)) return;
      pushHistory(nodes, links);
      // Links into or out of the node go with it
      set(state => ({
        nodes: state.nodes.filter(n => n.id !== nodeId),
        links: state.links.filter(l => l.sourceNodeId !== nodeId && l.targetNodeId !== nodeId),
      }));
      get().compile();
    },

    updateNodePosition: (nodeId, position) => {
      set(state => ({
        nodes: state.nodes.map(n => n.id === nodeId ? { ...n, position } : n),
      }));
    },

    updateNodeParams: (nodeId, params) => {
      const { nodes, links } = get();
      if (!nodes.some(n => n.id === nodeId)) return;
      pushHistory(nodes, links);
      set(state => ({
        nodes: state.nodes.map(n =>
          n.id === nodeId ? syncDynamicSockets({ ...n, params: { ...n.params, ...params } }) : n
        ),
      }));
      get().compile();
    },

    connectNodes: (sourceNodeId, sourceOutputKey, targetNodeId, targetInputKey) => {
      const { nodes, links } = get();
      const source = nodes.find(n => n.id === sourceNodeId);
      const target = nodes.find(n => n.id === targetNodeId);
      const targetSocket = target && Object.hasOwn(target.inputs, targetInputKey) ? target.inputs[targetInputKey] : undefined;

      if (!source || !targetSocket || !Object.hasOwn(source.outputs, sourceOutputKey)) {
        log.warn(`Cannot connect ${sourceNodeId}.${sourceOutputKey} → ${targetNodeId}.${targetInputKey}: no such socket`);
        return false;
      }
      if (sourceNodeId === targetNodeId) {
        log.warn(`Cannot connect node ${sourceNodeId} to itself`);
        return false;
      }
      const sourceType = inferOutputType(get().getGraph(), sourceNodeId, sourceOutputKey) ?? source.outputs[sourceOutputKey].type;
      if (!isConnectionCompatible(sourceType, targetSocket)) {
        log.warn(`Cannot connect ${sourceType} output to ${targetSocket.type} input "${targetInputKey}" of node ${targetNodeId}`);
        return false;
      }

      pushHistory(nodes, links);
      // An input holds one link; the new one replaces any existing link
      set(state => ({
        links: [
          ...state.links.filter(l => !(l.targetNodeId === targetNodeId && l.targetInputKey === targetInputKey)),
          { sourceNodeId, sourceOutputKey, targetNodeId, targetInputKey },
        ],
      }));
      get().compile();
      return true;
    },

    disconnectInput: (nodeId, inputKey) => {
      const { nodes, links } = get();
      const isTarget = (l: GraphLink) => l.targetNodeId === nodeId && l.targetInputKey === inputKey;
      if (!links.some(isTarget)) return;
      pushHistory(nodes, links);
      set(state => ({ links: state.links.filter(l => !isTarget(l)) }));
      get().compile();
    },

    compile: () => {
      const result = compileGraph(get().getGraph(), compileOptions);
      for (const d of result.diagnostics) log.debug(`${d.kind}: ${d.message}`);
      set({
        vertexShader: result.vertexShader,
        fragmentShader: result.fragmentShader,
        uniforms: result.uniforms,
        diagnostics: result.diagnostics,
        nodeOutputVarMap: result.nodeOutputVars,
      });
    },

    // Color → Output, the starting graph of a new document
    loadDefaultGraph: () => {
      const { nodes, links, nextNodeId } = get();
      const output = instantiateNode(nextNodeId, OUTPUT_NODE_TYPE, { x: 600, y: 200 });
      const color = instantiateNode(nextNodeId + 1, 'color', { x: 100, y: 150 });
      if (!output || !color) return;
      pushHistory(nodes, links);
      set(() => ({
        nodes: [output, color],
        links: [{ sourceNodeId: color.id, sourceOutputKey: 'rgb', targetNodeId: output.id, targetInputKey: 'color' }],
        nextNodeId: nextNodeId + 2,
        importErrors: [],
      }));
      get().compile();
    },

    // ─── Save / Load ───────────────────────────────────────────────────────────
    exportGraph: () => serializeGraph(get().getGraph()),

    importGraph: (json) => {
      const parsed = parseGraphSnapshot(json);
      if (!parsed.success) {
        log.warn(`Rejected graph import: ${parsed.errors.join('; ')}`);
        set({ importErrors: parsed.errors });
        return false;
      }
      const { nodes, links } = get();
      pushHistory(nodes, links);
      // Stored sockets are rebuilt from the node definitions
      set(state => ({
        nodes: parsed.graph.nodes.map(conformToDefinition),
        links: parsed.graph.links,
        nextNodeId: Math.max(state.nextNodeId, nextIdAfter(parsed.graph.nodes)),
        importErrors: [],
      }));
      get().compile();
      return true;
    },

    saveGraphToFile: async (path) => {
      await saveTextFile(get().exportGraph(), path);
    },

    loadGraphFromFile: async (path) => get().importGraph(await openTextFile(path)),
  }));
}
