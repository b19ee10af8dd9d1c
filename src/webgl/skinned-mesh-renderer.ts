/**
 * Skinned Mesh Renderer
 *
 * Draws a skinned mesh with GPU skinning. Vertex data is uploaded once;
 * each frame only the bone palette and projection change.
 *
 * @example
 * ```typescript
 * const renderer = new SkinnedMeshRenderer(canvas.getContext('webgl')!, mesh, skeleton.boneCount);
 * const loop = new AnimationLoop(seconds => {
 *   clip.apply(skeleton, seconds);
 *   renderer.draw(skeleton.packSkinMatrices(), projection);
 * });
 * loop.start();
 * ```
 */

import { ERROR_MESSAGES } from '../constants/errors';
import { SKELETON } from '../constants/skeleton';
import { SkinningErrorFactory } from '../errors';
import { maxReferencedJoint, type SkinnedMesh } from '../core/skinned-mesh';
import { Logger, LoggerFactory } from '../utils/logger';
import {
  SHADER_NAMES,
  attributeSetCount,
  createSkinningVertexShader,
  createSolidFragmentShader
} from './shader-sources';

/**
 * The part of WebGLRenderingContext the renderer uses.
 * Both WebGL 1 and WebGL 2 contexts satisfy it.
 */
export interface SkinningGl {
  readonly VERTEX_SHADER: number;
  readonly FRAGMENT_SHADER: number;
  readonly COMPILE_STATUS: number;
  readonly LINK_STATUS: number;
  readonly ARRAY_BUFFER: number;
  readonly ELEMENT_ARRAY_BUFFER: number;
  readonly STATIC_DRAW: number;
  readonly FLOAT: number;
  readonly UNSIGNED_SHORT: number;
  readonly UNSIGNED_INT: number;
  readonly POINTS: number;
  readonly LINES: number;
  readonly TRIANGLES: number;

  createShader(type: number): WebGLShader | null;
  shaderSource(shader: WebGLShader, source: string): void;
  compileShader(shader: WebGLShader): void;
  getShaderParameter(shader: WebGLShader, pname: number): unknown;
  getShaderInfoLog(shader: WebGLShader): string | null;
  deleteShader(shader: WebGLShader | null): void;

  createProgram(): WebGLProgram | null;
  attachShader(program: WebGLProgram, shader: WebGLShader): void;
  linkProgram(program: WebGLProgram): void;
  getProgramParameter(program: WebGLProgram, pname: number): unknown;
  getProgramInfoLog(program: WebGLProgram): string | null;
  deleteProgram(program: WebGLProgram | null): void;
  useProgram(program: WebGLProgram | null): void;

  createBuffer(): WebGLBuffer | null;
  bindBuffer(target: number, buffer: WebGLBuffer | null): void;
  bufferData(target: number, data: ArrayBufferView, usage: number): void;
  deleteBuffer(buffer: WebGLBuffer | null): void;

  getAttribLocation(program: WebGLProgram, name: string): number;
  getUniformLocation(program: WebGLProgram, name: string): WebGLUniformLocation | null;
  enableVertexAttribArray(index: number): void;
  vertexAttribPointer(index: number, size: number, type: number, normalized: boolean, stride: number, offset: number): void;
  uniformMatrix4fv(location: WebGLUniformLocation | null, transpose: boolean, data: Float32List): void;
  uniform4fv(location: WebGLUniformLocation | null, data: Float32List): void;

  getExtension(name: string): unknown;
  drawElements(mode: number, count: number, type: number, offset: number): void;
  drawArrays(mode: number, first: number, count: number): void;
}

export type Color = [number, number, number, number];

export interface RendererOptions {
  logger?: Logger;
  color?: Color;
}

interface AttributeBinding {
  location: number;
  buffer: WebGLBuffer;
  size: number;
  stride: number;
  offset: number;
}

const FLOAT_BYTES = 4;

function compileShader(gl: SkinningGl, type: number, source: string): WebGLShader {
  const shader = gl.createShader(type);
  if (!shader) {
    throw SkinningErrorFactory.renderError(ERROR_MESSAGES.SHADER_COMPILE_FAILED, 'createShader returned null');
  }
  gl.shaderSource(shader, source);
  gl.compileShader(shader);
  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const infoLog = gl.getShaderInfoLog(shader) ?? '';
    gl.deleteShader(shader);
    throw SkinningErrorFactory.renderError(
      `${ERROR_MESSAGES.SHADER_COMPILE_FAILED}: ${infoLog}`,
      infoLog,
      { shaderType: type === gl.VERTEX_SHADER ? 'vertex' : 'fragment' }
    );
  }
  return shader;
}

/**
 * Compiles both stages and links them. Shaders are released once linked.
 */
export function createProgram(gl: SkinningGl, vertexSource: string, fragmentSource: string): WebGLProgram {
  const vertexShader = compileShader(gl, gl.VERTEX_SHADER, vertexSource);
  let fragmentShader: WebGLShader;
  try {
    fragmentShader = compileShader(gl, gl.FRAGMENT_SHADER, fragmentSource);
  } catch (error) {
    gl.deleteShader(vertexShader);
    throw error;
  }

  const program = gl.createProgram();
  if (!program) {
    gl.deleteShader(vertexShader);
    gl.deleteShader(fragmentShader);
    throw SkinningErrorFactory.renderError(ERROR_MESSAGES.PROGRAM_LINK_FAILED, 'createProgram returned null');
  }

  gl.attachShader(program, vertexShader);
  gl.attachShader(program, fragmentShader);
  gl.linkProgram(program);
  gl.deleteShader(vertexShader);
  gl.deleteShader(fragmentShader);

  if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
    const infoLog = gl.getProgramInfoLog(program) ?? '';
    gl.deleteProgram(program);
    throw SkinningErrorFactory.renderError(`${ERROR_MESSAGES.PROGRAM_LINK_FAILED}: ${infoLog}`, infoLog);
  }

  return program;
}

export class SkinnedMeshRenderer {
  private readonly program: WebGLProgram;
  private readonly buffers: WebGLBuffer[] = [];
  private readonly attributes: AttributeBinding[] = [];
  private readonly indexBuffer: WebGLBuffer | null = null;
  private readonly bonesLocation: WebGLUniformLocation | null;
  private readonly projectionLocation: WebGLUniformLocation | null;
  private readonly colorLocation: WebGLUniformLocation | null;
  private readonly logger: Logger;
  private readonly color: Color;
  private disposed = false;

  constructor(
    private readonly gl: SkinningGl,
    private readonly mesh: SkinnedMesh,
    private readonly boneCount: number,
    options: RendererOptions = {}
  ) {
    this.logger = options.logger ?? LoggerFactory.forRendering();
    this.color = options.color ?? [0, 0, 0, 1];

    const maxJoint = maxReferencedJoint(mesh);
    if (maxJoint >= boneCount) {
      throw SkinningErrorFactory.validationError(
        `Mesh "${mesh.name}" references joint ${maxJoint}, palette has ${boneCount} bones`,
        'joints',
        { mesh: mesh.name, joint: maxJoint, boneCount }
      );
    }
    if (mesh.indices instanceof Uint32Array && !gl.getExtension('OES_element_index_uint')) {
      throw SkinningErrorFactory.renderError(
        '32-bit indices need OES_element_index_uint',
        'OES_element_index_uint unavailable',
        { mesh: mesh.name }
      );
    }

    this.program = createProgram(
      gl,
      createSkinningVertexShader({ boneCount, influencesPerVertex: mesh.influencesPerVertex }),
      createSolidFragmentShader()
    );

    try {
      const positionBuffer = this.createBuffer(gl.ARRAY_BUFFER, mesh.positions);
      this.bindAttribute(SHADER_NAMES.POSITION, positionBuffer, 3, 0, 0);

      // Joint and weight sets are interleaved in one buffer each
      const jointBuffer = this.createBuffer(gl.ARRAY_BUFFER, Float32Array.from(mesh.joints));
      const weightBuffer = this.createBuffer(gl.ARRAY_BUFFER, mesh.weights);
      const stride = mesh.influencesPerVertex * FLOAT_BYTES;
      for (let set = 0; set < attributeSetCount(mesh.influencesPerVertex); set++) {
        const offset = set * SKELETON.JOINTS_PER_ATTRIBUTE * FLOAT_BYTES;
        this.bindAttribute(`${SHADER_NAMES.JOINTS_PREFIX}${set}`, jointBuffer, 4, stride, offset);
        this.bindAttribute(`${SHADER_NAMES.WEIGHTS_PREFIX}${set}`, weightBuffer, 4, stride, offset);
      }

      if (mesh.indices) {
        this.indexBuffer = this.createBuffer(gl.ELEMENT_ARRAY_BUFFER, mesh.indices);
      }
    } catch (error) {
      this.releaseGlObjects();
      throw error;
    }

    this.bonesLocation = gl.getUniformLocation(this.program, SHADER_NAMES.BONES);
    this.projectionLocation = gl.getUniformLocation(this.program, SHADER_NAMES.PROJECTION);
    this.colorLocation = gl.getUniformLocation(this.program, SHADER_NAMES.COLOR);

    this.logger.debug('Skinned mesh renderer ready', {
      mesh: mesh.name,
      vertices: mesh.vertexCount,
      bones: boneCount,
      influencesPerVertex: mesh.influencesPerVertex,
    });
  }

  private createBuffer(target: number, data: ArrayBufferView): WebGLBuffer {
    const buffer = this.gl.createBuffer();
    if (!buffer) {
      throw SkinningErrorFactory.renderError('Failed to create buffer', 'createBuffer returned null');
    }
    this.gl.bindBuffer(target, buffer);
    this.gl.bufferData(target, data, this.gl.STATIC_DRAW);
    this.buffers.push(buffer);
    return buffer;
  }

  private bindAttribute(name: string, buffer: WebGLBuffer, size: number, stride: number, offset: number): void {
    const location = this.gl.getAttribLocation(this.program, name);
    if (location < 0) {
      // Unused attributes are stripped by the GLSL compiler
      this.logger.warn(`Attribute ${name} not found in program`, { mesh: this.mesh.name });
    }
    this.attributes.push({ location, buffer, size, stride, offset });
  }

  private primitiveMode(): number {
    switch (this.mesh.mode) {
      case 'points':
        return this.gl.POINTS;
      case 'lines':
        return this.gl.LINES;
      case 'triangles':
        return this.gl.TRIANGLES;
    }
  }

  /**
   * Draws the mesh with a packed bone palette (boneCount × 16 floats,
   * see Skeleton.packSkinMatrices) and a projection matrix.
   */
  draw(palette: Float32Array, projection: ArrayLike<number>, color: Color = this.color): void {
    if (this.disposed) {
      throw SkinningErrorFactory.renderError(ERROR_MESSAGES.RENDERER_DISPOSED, '', { mesh: this.mesh.name });
    }
    if (palette.length !== this.boneCount * 16) {
      throw SkinningErrorFactory.validationError(
        `Bone palette has ${palette.length} floats, expected ${this.boneCount * 16}`,
        'palette',
        { boneCount: this.boneCount }
      );
    }

    const { gl } = this;
    gl.useProgram(this.program);

    for (const attribute of this.attributes) {
      if (attribute.location < 0) continue;
      gl.bindBuffer(gl.ARRAY_BUFFER, attribute.buffer);
      gl.enableVertexAttribArray(attribute.location);
      gl.vertexAttribPointer(attribute.location, attribute.size, gl.FLOAT, false, attribute.stride, attribute.offset);
    }

    gl.uniformMatrix4fv(this.projectionLocation, false, Float32Array.from(projection));
    gl.uniformMatrix4fv(this.bonesLocation, false, palette);
    gl.uniform4fv(this.colorLocation, color);

    const mode = this.primitiveMode();
    if (this.indexBuffer && this.mesh.indices) {
      const type = this.mesh.indices instanceof Uint32Array ? gl.UNSIGNED_INT : gl.UNSIGNED_SHORT;
      gl.bindBuffer(gl.ELEMENT_ARRAY_BUFFER, this.indexBuffer);
      gl.drawElements(mode, this.mesh.indices.length, type, 0);
    } else {
      gl.drawArrays(mode, 0, this.mesh.vertexCount);
    }
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Releases the program and buffers. Further draws throw.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.releaseGlObjects();
  }

  private releaseGlObjects(): void {
    for (const buffer of this.buffers) {
      this.gl.deleteBuffer(buffer);
    }
    this.buffers.length = 0;
    this.gl.deleteProgram(this.program);
  }
}
