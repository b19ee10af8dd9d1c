/**
 * GLSL sources for GPU skinning (GLSL ES 1.00, WebGL 1 and 2).
 *
 * The vertex shader blends the bone palette per vertex:
 *
 *   skin = Σ u_bones[joint_k] · weight_k
 *   gl_Position = u_projection · skin · position
 *
 * WebGL 1 has no integer attributes, so joint indices arrive as floats.
 */

import { SKELETON } from '../constants/skeleton';
import { SkinningErrorFactory } from '../errors';

export interface SkinningShaderOptions {
  boneCount: number;
  /** 4 or 8; each group of four uses one joints/weights attribute pair */
  influencesPerVertex: number;
}

export const SHADER_NAMES = {
  POSITION: 'a_position',
  JOINTS_PREFIX: 'a_joints',
  WEIGHTS_PREFIX: 'a_weights',
  BONES: 'u_bones',
  PROJECTION: 'u_projection',
  COLOR: 'u_color',
} as const;

const COMPONENTS = ['x', 'y', 'z', 'w'] as const;

export function attributeSetCount(influencesPerVertex: number): number {
  return influencesPerVertex / SKELETON.JOINTS_PER_ATTRIBUTE;
}

export function createSkinningVertexShader(options: SkinningShaderOptions): string {
  const { boneCount, influencesPerVertex } = options;
  if (!Number.isInteger(boneCount) || boneCount < 1) {
    throw SkinningErrorFactory.validationError(`Bone count must be a positive integer, got ${boneCount}`, 'boneCount');
  }
  if (influencesPerVertex !== SKELETON.JOINTS_PER_ATTRIBUTE && influencesPerVertex !== SKELETON.MAX_INFLUENCES) {
    throw SkinningErrorFactory.validationError(
      `Influences per vertex must be 4 or 8, got ${influencesPerVertex}`,
      'influencesPerVertex'
    );
  }

  const sets = attributeSetCount(influencesPerVertex);
  const declarations: string[] = [];
  const terms: string[] = [];
  const totals: string[] = [];

  for (let set = 0; set < sets; set++) {
    const joints = `${SHADER_NAMES.JOINTS_PREFIX}${set}`;
    const weights = `${SHADER_NAMES.WEIGHTS_PREFIX}${set}`;
    declarations.push(`attribute vec4 ${joints};`, `attribute vec4 ${weights};`);
    for (const c of COMPONENTS) {
      terms.push(`${SHADER_NAMES.BONES}[int(${joints}.${c})] * ${weights}.${c}`);
    }
    totals.push(`dot(${weights}, vec4(1.0))`);
  }

  return [
    `attribute vec3 ${SHADER_NAMES.POSITION};`,
    ...declarations,
    `uniform mat4 ${SHADER_NAMES.PROJECTION};`,
    `uniform mat4 ${SHADER_NAMES.BONES}[${boneCount}];`,
    '',
    'void main() {',
    `  mat4 skin = ${terms.join(' +\n    ')};`,
    `  float total = ${totals.join(' + ')};`,
    '  // Unweighted vertices stay at their bind position',
    '  skin += mat4(1.0) * (1.0 - step(0.000001, total));',
    `  gl_Position = ${SHADER_NAMES.PROJECTION} * skin * vec4(${SHADER_NAMES.POSITION}, 1.0);`,
    '  gl_PointSize = 4.0;',
    '}',
    '',
  ].join('\n');
}

export function createSolidFragmentShader(): string {
  return [
    'precision mediump float;',
    `uniform vec4 ${SHADER_NAMES.COLOR};`,
    '',
    'void main() {',
    `  gl_FragColor = ${SHADER_NAMES.COLOR};`,
    '}',
    '',
  ].join('\n');
}
