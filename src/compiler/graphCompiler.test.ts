import { describe, it, expect, vi } from 'vitest';
import { compileGraph } from './graphCompiler';
import { VERTEX_SHADER } from './shaderAssembler';
import { graph, link, mainBody, node } from './testGraphs';
import type { GraphNode } from '../types/nodeGraph';

const DEFAULT_GRAPH_SHADER = [
  '#version 330 core',
  'out vec4 FragColor;',
  '',
  'in vec3 FragPos;',
  'in vec3 Normal;',
  '',
  'uniform float time;',
  'uniform vec3 lightPos;',
  'uniform vec3 viewPos;',
  'uniform vec3 lightColor;',
  'uniform vec3 objectColor;',
  '',
  'void main()',
  '{',
  '    vec3 finalColor = vec3(1.000, 0.500, 0.200);',
  '    float finalAlpha = 1.0;',
  '    FragColor = vec4(finalColor, finalAlpha);',
  '}',
  '',
].join('\n');

describe('compileGraph', () => {
  describe('basic graphs', () => {
    it('compiles Color → Output to a full fragment shader', () => {
      const result = compileGraph(graph([node(0, 'output'), node(1, 'color')], [link(1, 'rgb', 0, 'color')]));

      expect(result.success).toBe(true);
      expect(result.statements).toEqual([]);
      expect(result.diagnostics).toEqual([]);
      expect(result.fragmentShader).toBe(DEFAULT_GRAPH_SHADER);
      expect(result.vertexShader).toBe(VERTEX_SHADER);
    });

    it('uses the Output defaults when nothing is wired in', () => {
      const result = compileGraph(graph([node(0, 'output')]));

      expect(mainBody(result.fragmentShader)).toEqual([
        '    vec3 finalColor = vec3(1.0, 0.5, 0.2);',
        '    float finalAlpha = 1.0;',
        '    FragColor = vec4(finalColor, finalAlpha);',
      ]);
    });

    it('writes the fallback color when there is no Output node', () => {
      const result = compileGraph(graph([node(1, 'float', { value: 3 })]));

      expect(result.success).toBe(true);
      expect(result.statements).toEqual([]);
      expect(mainBody(result.fragmentShader)).toEqual(['    FragColor = vec4(1.0, 0.0, 1.0, 1.0);']);
      expect(result.diagnostics.map(d => d.kind)).toEqual(['missing-output']);
    });

    it('honors a custom fallback color', () => {
      const result = compileGraph(graph([]), { fallbackColor: [0, 0.5, 0, 1] });

      expect(mainBody(result.fragmentShader)).toEqual(['    FragColor = vec4(0.0, 0.5, 0.0, 1.0);']);
    });
  });

  describe('ordering and reachability', () => {
    it('declares temporaries after the values they read', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'time'), node(2, 'sin'), node(3, 'abs'), node(4, 'add'), node(5, 'float', { value: 2 })],
        [
          link(1, 'time', 2, 'x'),
          link(2, 'result', 3, 'x'),
          link(3, 'result', 4, 'a'),
          link(5, 'value', 4, 'b'),
          link(4, 'result', 0, 'alpha'),
        ],
      );

      const result = compileGraph(g);

      expect(result.statements).toEqual([
        'float tmp0 = sin(time);',
        'float tmp1 = abs(tmp0);',
        'float tmp2 = (tmp1 + 2.000);',
      ]);
      expect(mainBody(result.fragmentShader)).toContain('    float finalAlpha = tmp2;');
    });

    it('leaves out nodes that do not reach the Output node', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'color'), node(5, 'float', { value: 3 }), node(6, 'sin')],
        [link(1, 'rgb', 0, 'color'), link(5, 'value', 6, 'x')],
      );

      const result = compileGraph(g);

      expect(result.statements).toEqual([]);
      expect(result.fragmentShader).not.toContain('3.000');
      expect(result.fragmentShader).not.toContain('sin(');
      expect([...result.nodeOutputVars.keys()]).toEqual([1]);
    });

    it('shares one temporary between a diamond’s two branches', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'time'), node(2, 'sin'), node(3, 'cos'), node(4, 'add')],
        [
          link(1, 'time', 2, 'x'),
          link(1, 'time', 3, 'x'),
          link(2, 'result', 4, 'a'),
          link(3, 'result', 4, 'b'),
          link(4, 'result', 0, 'alpha'),
        ],
      );

      expect(compileGraph(g).statements).toEqual([
        'float tmp0 = time;',
        'float tmp1 = sin(tmp0);',
        'float tmp2 = cos(tmp0);',
        'float tmp3 = (tmp1 + tmp2);',
      ]);
    });

    it('is deterministic across repeated compiles and does not mutate the graph', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'position'), node(2, 'makeVec3')],
        [link(1, 'x', 2, 'x'), link(1, 'y', 2, 'y'), link(2, 'vec', 0, 'color')],
      );
      const before = structuredClone(g);

      const first = compileGraph(g);
      const second = compileGraph(g);

      expect(second.fragmentShader).toBe(first.fragmentShader);
      expect(second.statements).toEqual(first.statements);
      expect(g).toEqual(before);
    });
  });

  describe('inlining and fan-out', () => {
    it('materializes a constant read by three sockets once', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'float', { value: 0.5 }), node(2, 'add'), node(3, 'mix'), node(4, 'makeVec3')],
        [
          link(1, 'value', 2, 'a'),
          link(1, 'value', 2, 'b'),
          link(1, 'value', 3, 't'),
          link(2, 'result', 4, 'x'),
          link(3, 'result', 4, 'y'),
          link(4, 'vec', 0, 'color'),
        ],
      );

      const result = compileGraph(g);

      expect(result.statements).toEqual([
        'float tmp0 = 0.500;',
        'float tmp1 = (tmp0 + tmp0);',
        'float tmp2 = mix(0.0, 1.0, tmp0);',
        'vec3 tmp3 = vec3(tmp1, tmp2, 0.0);',
      ]);
      expect(result.statements.filter(s => s.includes('0.500'))).toHaveLength(1);
      expect(mainBody(result.fragmentShader)).toContain('    vec3 finalColor = tmp3;');
    });

    it('declares a constant feeding three consumer nodes exactly once', () => {
      const g = graph(
        [
          node(0, 'output'),
          node(1, 'float', { value: 0.5 }),
          node(2, 'sin'),
          node(3, 'cos'),
          node(4, 'abs'),
          node(5, 'add'),
          node(6, 'mix'),
        ],
        [
          link(1, 'value', 2, 'x'),
          link(1, 'value', 3, 'x'),
          link(1, 'value', 4, 'x'),
          link(2, 'result', 5, 'a'),
          link(3, 'result', 5, 'b'),
          link(5, 'result', 6, 'a'),
          link(4, 'result', 6, 't'),
          link(6, 'result', 0, 'alpha'),
        ],
      );

      const result = compileGraph(g);

      expect(result.statements).toEqual([
        'float tmp0 = 0.500;',
        'float tmp1 = sin(tmp0);',
        'float tmp2 = cos(tmp0);',
        'float tmp3 = (tmp1 + tmp2);',
        'float tmp4 = abs(tmp0);',
        'float tmp5 = mix(tmp3, 1.0, tmp4);',
      ]);
      expect(result.statements.join('\n').match(/\btmp0\b/g)).toHaveLength(4);
    });

    it('materializes every consumed output of a shared multi-output source', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'position'), node(2, 'makeVec3')],
        [link(1, 'x', 2, 'x'), link(1, 'y', 2, 'y'), link(2, 'vec', 0, 'color')],
      );

      const result = compileGraph(g);

      expect(result.statements).toEqual([
        'float tmp0 = FragPos.x;',
        'float tmp1 = FragPos.y;',
        'vec3 tmp2 = vec3(tmp0, tmp1, 0.0);',
      ]);
      expect(result.nodeOutputVars.get(1)).toEqual({ x: 'tmp0', y: 'tmp1' });
    });

    it('inlines single-use sources into their consumer', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'normal'), node(2, 'splitVec3')],
        [link(1, 'normal', 2, 'vec'), link(2, 'y', 0, 'alpha')],
      );

      expect(compileGraph(g).statements).toEqual(['float tmp0 = (normalize(Normal)).y;']);
    });
  });

  describe('node expressions', () => {
    it('emits the fresnel falloff', () => {
      const g = graph([node(0, 'output'), node(1, 'fresnel')], [link(1, 'factor', 0, 'alpha')]);

      expect(compileGraph(g).statements).toEqual([
        'float tmp0 = pow(1.0 - max(dot(normalize(Normal), normalize(viewPos - FragPos)), 0.0), 2.0);',
      ]);
    });

    it('formats clamp bounds from node params', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'time'), node(2, 'clamp', { min: -1, max: 2 })],
        [link(1, 'time', 2, 'x'), link(2, 'result', 0, 'alpha')],
      );

      expect(compileGraph(g).statements).toEqual(['float tmp0 = clamp(time, -1.000, 2.000);']);
    });
  });

  describe('types', () => {
    it('widens multiply to vec3 when a vector is wired in', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'color'), node(2, 'multiply'), node(3, 'multiply')],
        [link(1, 'rgb', 2, 'a'), link(2, 'result', 3, 'b'), link(3, 'result', 0, 'color')],
      );

      const result = compileGraph(g);

      expect(result.statements).toEqual([
        'vec3 tmp0 = (vec3(1.000, 0.500, 0.200) * 1.0);',
        'vec3 tmp1 = (1.0 * tmp0);',
      ]);
      expect(result.diagnostics).toEqual([]);
      expect(mainBody(result.fragmentShader)).toContain('    vec3 finalColor = tmp1;');
    });

    it('keeps multiply scalar for two floats', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'float', { value: 2 }), node(2, 'time'), node(3, 'multiply')],
        [link(1, 'value', 3, 'a'), link(2, 'time', 3, 'b'), link(3, 'result', 0, 'alpha')],
      );

      expect(compileGraph(g).statements).toEqual(['float tmp0 = (2.000 * time);']);
    });

    it('broadcasts a float into a vector input', () => {
      const g = graph([node(0, 'output'), node(1, 'float', { value: 0.25 })], [link(1, 'value', 0, 'color')]);

      const result = compileGraph(g);

      expect(mainBody(result.fragmentShader)[0]).toBe('    vec3 finalColor = vec3(0.250);');
      expect(result.diagnostics).toEqual([]);
    });

    it('falls back to the default on a vector fed into a float input', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'position'), node(2, 'sin')],
        [link(1, 'xyz', 2, 'x'), link(2, 'result', 0, 'alpha')],
      );

      const result = compileGraph(g);

      expect(result.statements).toEqual(['float tmp0 = sin(0.0);']);
      expect(result.diagnostics).toEqual([
        { kind: 'type-mismatch', message: 'Node 2: input "x" expects float, got vec3; using its default', nodeId: 2 },
      ]);
    });
  });

  describe('cycles', () => {
    it('breaks a two-node cycle and uses the default on the closing input', () => {
      const g = graph(
        [node(0, 'output'), node(1, 'add'), node(2, 'add')],
        [link(2, 'result', 1, 'a'), link(1, 'result', 2, 'a'), link(1, 'result', 0, 'alpha')],
      );

      const result = compileGraph(g);

      expect(result.success).toBe(true);
      expect(result.statements).toEqual(['float tmp0 = (0.0 + 0.0);', 'float tmp1 = (tmp0 + 0.0);']);
      expect(result.diagnostics.map(d => [d.kind, d.nodeId])).toEqual([['cycle', 2]]);
    });

    it('breaks a self-loop', () => {
      const g = graph([node(0, 'output'), node(1, 'sin')], [link(1, 'result', 1, 'x'), link(1, 'result', 0, 'alpha')]);

      const result = compileGraph(g);

      expect(result.statements).toEqual(['float tmp0 = sin(0.0);']);
      expect(result.diagnostics.map(d => d.kind)).toEqual(['cycle']);
    });

    it('ignores a cycle that does not reach the Output node', () => {
      const g = graph(
        [node(0, 'output'), node(3, 'add'), node(4, 'add')],
        [link(3, 'result', 4, 'a'), link(4, 'result', 3, 'a')],
      );

      const result = compileGraph(g);

      expect(result.statements).toEqual([]);
      expect(result.diagnostics).toEqual([]);
    });
  });

  describe('uniforms', () => {
    it('declares parameter uniforms after the built-ins, wired or not', () => {
      const g = graph(
        [
          node(0, 'output'),
          node(1, 'floatParam', { name: 'speed', label: 'Speed', value: 2 }),
          node(2, 'time'),
          node(3, 'multiply'),
          node(4, 'vectorParam', { name: 'tint', label: 'Tint', valueType: 'vec4', value: [1, 0, 0, 1] }),
        ],
        [link(1, 'value', 3, 'a'), link(2, 'time', 3, 'b'), link(3, 'result', 0, 'alpha')],
      );

      const result = compileGraph(g);
      const lines = result.fragmentShader.split('\n');

      expect(result.statements).toEqual(['float tmp0 = (u_speed * time);']);
      expect(lines.slice(lines.indexOf('uniform vec3 objectColor;') + 1, lines.indexOf('void main()'))).toEqual([
        'uniform float u_speed;',
        'uniform vec4 u_tint;',
        '',
      ]);
      expect(result.uniforms).toEqual([
        { name: 'u_speed', label: 'Speed', type: 'float', value: 2 },
        { name: 'u_tint', label: 'Tint', type: 'vec4', value: [1, 0, 0, 1] },
      ]);
    });
  });

  describe('damaged graphs', () => {
    it('skips nodes of an unknown type', () => {
      const mystery: GraphNode = {
        id: 1,
        type: 'mystery',
        position: { x: 0, y: 0 },
        inputs: {},
        outputs: { value: { type: 'float', label: 'Value' } },
        params: {},
      };
      const g = graph([node(0, 'output'), mystery], [link(1, 'value', 0, 'alpha')]);

      const result = compileGraph(g);

      expect(result.statements).toEqual([]);
      expect(mainBody(result.fragmentShader)[1]).toBe('    float finalAlpha = 1.0;');
      expect(result.diagnostics.map(d => [d.kind, d.nodeId])).toEqual([['unknown-node-type', 1]]);
    });

    it('ignores links to missing nodes', () => {
      const result = compileGraph(graph([node(0, 'output')], [link(99, 'value', 0, 'alpha')]));

      expect(mainBody(result.fragmentShader)[1]).toBe('    float finalAlpha = 1.0;');
      expect(result.diagnostics).toEqual([
        { kind: 'dangling-link', message: 'Ignoring link 99.value → 0.alpha: source node 99 does not exist', nodeId: 0 },
      ]);
    });

    it('rebuilds inputs a stored node is missing from its definition', () => {
      const g = graph([node(0, 'output'), { ...node(1, 'add'), inputs: {} }], [link(1, 'result', 0, 'alpha')]);

      const result = compileGraph(g);

      expect(result.statements).toEqual(['float tmp0 = (0.0 + 0.0);']);
      expect(mainBody(result.fragmentShader)[1]).toBe('    float finalAlpha = tmp0;');
      expect(result.fragmentShader).not.toContain('undefined');
    });

    it('takes output kinds from the definition, not the stored socket', () => {
      const g = graph(
        [node(0, 'output'), { ...node(1, 'color'), outputs: { rgb: { type: 'float', label: 'RGB' } } }, node(2, 'multiply')],
        [link(1, 'rgb', 2, 'a'), link(1, 'rgb', 2, 'b'), link(2, 'result', 0, 'color')],
      );

      const result = compileGraph(g);

      expect(result.statements).toEqual(['vec3 tmp0 = vec3(1.000, 0.500, 0.200);', 'vec3 tmp1 = (tmp0 * tmp0);']);
      expect(result.diagnostics).toEqual([]);
    });

    it('uses the first of several Output nodes', () => {
      const g = graph([node(0, 'output'), node(1, 'output'), node(2, 'time')], [link(2, 'time', 1, 'alpha')]);

      const result = compileGraph(g);

      expect(mainBody(result.fragmentShader)[1]).toBe('    float finalAlpha = 1.0;');
      expect(result.diagnostics.map(d => [d.kind, d.nodeId])).toEqual([['multiple-outputs', 0]]);
    });

    it('returns the fallback shader when a node throws', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const g = graph([node(0, 'output'), node(1, 'time')], [link(1, 'time', 0, 'alpha')]);
      // Getter that throws partway through the compile
      Object.defineProperty(g.nodes[1], 'inputs', {
        get: () => {
          throw new Error('boom');
        },
      });

      const result = compileGraph(g);

      expect(result.success).toBe(false);
      expect(mainBody(result.fragmentShader)).toEqual(['    FragColor = vec4(1.0, 0.0, 1.0, 1.0);']);
      expect(result.diagnostics).toEqual([{ kind: 'internal-error', message: 'boom' }]);
      expect(error).toHaveBeenCalledWith('[graphCompiler]', 'compilation failed:', 'boom');
      error.mockRestore();
    });
  });
});
