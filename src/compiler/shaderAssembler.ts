import type { UniformParameter } from '../types/nodeGraph';
import { f } from '../nodes/definitions/helpers';

export type Rgba = [number, number, number, number];

// Magenta: impossible to mistake for a real material
export const FALLBACK_COLOR: Rgba = [1, 0, 1, 1];

/** Uniforms every fragment shader declares, with the values the runtime binds by default. */
export const BUILTIN_UNIFORMS: readonly UniformParameter[] = [
  { name: 'time',        label: 'Time',           type: 'float', value: 0 },
  { name: 'lightPos',    label: 'Light position', type: 'vec3',  value: [2.0, 2.0, 2.0] },
  { name: 'viewPos',     label: 'View position',  type: 'vec3',  value: [0.0, 0.0, 3.0] },
  { name: 'lightColor',  label: 'Light color',    type: 'vec3',  value: [1.0, 1.0, 1.0] },
  { name: 'objectColor', label: 'Object color',   type: 'vec3',  value: [0.3, 0.6, 0.9] },
];

export const VERTEX_SHADER = `#version 330 core
layout (location = 0) in vec3 aPos;
layout (location = 1) in vec3 aNormal;

out vec3 FragPos;
out vec3 Normal;

uniform mat4 model;
uniform mat4 view;
uniform mat4 projection;

void main()
{
    FragPos = vec3(model * vec4(aPos, 1.0));
    Normal = mat3(transpose(inverse(model))) * aNormal;
    gl_Position = projection * view * model * vec4(aPos, 1.0);
}
`;

const INDENT = '    ';

export interface ShaderBody {
  /** Temporary declarations in dependency order, without indentation */
  statements: string[];
  /** Resolved Output inputs; null when the graph has no Output node */
  output: { color: string; alpha: string } | null;
}

export function fallbackStatement(color: Rgba = FALLBACK_COLOR): string {
  return `FragColor = vec4(${color.map(f).join(', ')});`;
}

export function assembleFragmentShader(
  uniforms: UniformParameter[],
  body: ShaderBody,
  fallbackColor: Rgba = FALLBACK_COLOR,
): string {
  const header = [
    '#version 330 core',
    'out vec4 FragColor;',
    '',
    'in vec3 FragPos;',
    'in vec3 Normal;',
    '',
    ...[...BUILTIN_UNIFORMS, ...uniforms].map(u => `uniform ${u.type} ${u.name};`),
    '',
    'void main()',
    '{',
  ];

  const main = body.output
    ? [
        ...body.statements,
        `vec3 finalColor = ${body.output.color};`,
        `float finalAlpha = ${body.output.alpha};`,
        'FragColor = vec4(finalColor, finalAlpha);',
      ]
    : [fallbackStatement(fallbackColor)];

  return [...header, ...main.map(line => INDENT + line), '}', ''].join('\n');
}
