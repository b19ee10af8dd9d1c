/**
 * skinkit
 *
 * Skeletal mesh skinning: bone hierarchies, vertex weights, bind poses,
 * CPU and WebGL linear blend skinning, and glTF skin import/export.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'skinkit';
 *
 * const skinning = defineConfig({
 *   debug: true,
 *   debugOutputDir: './debug-output'
 * });
 *
 * const [model] = await skinning.load('./character.glb');
 * const frame = await skinning.pose(model, 0.5, 'Walk');
 * const glb = await skinning.exportGlb(model);
 * ```
 */

import { ZodError } from 'zod';
import { importSkinnedModels } from './converters/gltf';
import { exportGlb } from './converters/gltf/skin-writer';
import { writeDebugOutput } from './converters/helpers/debug-writer';
import { findClip, type SkinnedModel } from './core/skinned-model';
import { SkinningErrorFactory } from './errors';
import { SkinningConfigSchema, type SkinningConfig, type SkinningConfigInput } from './schemas';
import { skinVertices } from './skinning/linear-blend-skinning';
import { Logger, LoggerFactory } from './utils/logger';

/**
 * Skinned vertex data for one mesh of a posed model
 */
export interface PosedMesh {
  name: string;
  positions: Float32Array;
  normals?: Float32Array;
}

export interface PosedFrame {
  model: string;
  /** Clip that was sampled, or null for the rest pose */
  clip: string | null;
  seconds: number;
  meshes: PosedMesh[];
}

/**
 * Main framework class
 */
export class SkinningFramework {
  private config: SkinningConfig;
  private logger: Logger;

  constructor(config: SkinningConfigInput = {}) {
    try {
      this.config = SkinningConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw SkinningErrorFactory.configError(
          'Invalid configuration',
          'SkinningConfig',
          { zodError: error, issues: error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) }
        );
      }
      throw error;
    }
    this.logger = this.config.debug ? LoggerFactory.forDebug() : LoggerFactory.forImport(this.config.logLevel);
    this.logger.logConfig({ ...this.config });
  }

  /**
   * Loads every skinned model from a GLB buffer or a .glb/.gltf path.
   *
   * @example
   * ```typescript
   * const models = await skinning.load('./model.glb');
   * const fromBuffer = await skinning.load(await fs.promises.readFile('model.glb').then(b => b.buffer));
   * ```
   */
  async load(input: string | ArrayBuffer): Promise<SkinnedModel[]> {
    return importSkinnedModels(input, this.config, this.logger);
  }

  /**
   * Poses the model at `seconds` of a clip (the first clip when no name is
   * given, the rest pose when the model has none) and skins every mesh on
   * the CPU. The model's skeleton keeps the sampled pose.
   */
  async pose(model: SkinnedModel, seconds: number, clipName?: string): Promise<PosedFrame> {
    const clip = findClip(model, clipName);
    if (clipName !== undefined && !clip) {
      throw SkinningErrorFactory.validationError(
        `Model "${model.name}" has no clip named "${clipName}"`,
        'clipName',
        { clips: model.clips.map(c => c.name) }
      );
    }

    model.skeleton.resetPose();
    clip?.apply(model.skeleton, seconds, { loop: this.config.loop });

    const skinMatrices = model.skeleton.computeSkinMatrices();
    const frame: PosedFrame = {
      model: model.name,
      clip: clip?.name ?? null,
      seconds,
      meshes: model.meshes.map(mesh => ({ name: mesh.name, ...skinVertices(mesh, skinMatrices) })),
    };

    if (this.config.debug) {
      await writeDebugOutput(this.config.debugOutputDir, {
        pose: {
          model: frame.model,
          clip: frame.clip,
          seconds: frame.seconds,
          meshes: frame.meshes.map(mesh => ({ name: mesh.name, positions: Array.from(mesh.positions) })),
        },
        glb: await exportGlb(model, this.logger),
      });
    }

    return frame;
  }

  /**
   * Serializes a model, with its skin and clips, as GLB bytes.
   */
  async exportGlb(model: SkinnedModel): Promise<Uint8Array> {
    return exportGlb(model, this.logger);
  }

  /**
   * Get current configuration
   */
  getConfig(): SkinningConfig {
    return { ...this.config };
  }
}

/**
 * Create framework instance with configuration
 *
 * @example
 * ```typescript
 * const skinning = defineConfig({ maxInfluences: 8, logLevel: LogLevel.WARN });
 * ```
 */
export function defineConfig(config: SkinningConfigInput = {}): SkinningFramework {
  return new SkinningFramework(config);
}

/**
 * TypeScript type exports
 */
export type {
  SkinningConfig,
  SkinningConfigInput,
  BoneDefinitionInput,
  SkinnedMeshInput,
  AnimationClipInput,
  AnimationTrackInput,
  VertexInfluence,
  InfluenceOptions,
  Interpolation,
  TrackPath,
  PrimitiveMode,
  OscillationOptions,
  OscillationOptionsInput,
} from './schemas';

export * from './errors';
export { LogLevel, Logger, LoggerFactory, createLogger } from './utils/logger';
export * from './utils/matrix-utils';
export * from './utils/quaternion-utils';

export { Skeleton, type Bone, type BoneTransform } from './core/skeleton';
export {
  createSkinnedMesh,
  buildSkinnedMesh,
  listInfluences,
  maxReferencedJoint,
  type SkinnedMesh,
} from './core/skinned-mesh';
export { findClip, type SkinnedModel } from './core/skinned-model';
export * from './skinning/weights';
export { skinVertex, skinVertices, type SkinningResult } from './skinning/linear-blend-skinning';

export { sampleTrack, componentsFor, type AnimationTrack } from './animation/animation-sampler';
export { AnimationClip, type ApplyOptions } from './animation/animation-clip';
export {
  createOscillatingClip,
  applyOscillation,
  oscillationAngle,
} from './animation/procedural';
export {
  AnimationLoop,
  createDefaultScheduler,
  createTimerScheduler,
  type FrameCallback,
  type FrameScheduler,
} from './animation/animation-loop';

export { importSkinnedModels, readSkinnedModels, writeSkinnedModel, exportGlb } from './converters/gltf';
export { writeDebugOutput } from './converters/helpers/debug-writer';

export { createSkinningVertexShader, createSolidFragmentShader, SHADER_NAMES } from './webgl/shader-sources';
export { SkinnedMeshRenderer, createProgram, type SkinningGl, type Color } from './webgl/skinned-mesh-renderer';

export { createLineMeshDemo, evaluateLineMeshDemo, toSkinnedModel, type LineMeshDemo } from './demo/line-mesh-demo';
