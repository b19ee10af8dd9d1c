/**
 * Skeleton
 *
 * A bone hierarchy with a rest pose, a current (animated) pose and a
 * bind pose. Bones may be stored in any order; world matrices are always
 * evaluated parents first.
 *
 * @example
 * ```typescript
 * const skeleton = Skeleton.fromDefinitions([
 *   { name: 'hip' },
 *   { name: 'knee', parent: 0, translation: [0, -4, 0] },
 * ]);
 * skeleton.bind();
 * skeleton.setLocalTransform(1, { rotation: quatFromAxisAngle([1, 0, 0], 0.5) });
 * const palette = skeleton.packSkinMatrices();
 * ```
 */

import { SKELETON } from '../constants/skeleton';
import { ERROR_MESSAGES } from '../constants/errors';
import { SkinningErrorFactory } from '../errors';
import { BoneDefinitionsSchema, type BoneDefinition, type BoneDefinitionInput } from '../schemas';
import { parseWithSchema } from '../validation';
import {
  formatMatrix,
  fromRotationTranslationScale,
  invert,
  multiply,
  toMat4,
  type Mat4,
  type Quat,
  type Vec3
} from '../utils/matrix-utils';

/**
 * Local transform of a bone relative to its parent
 */
export interface BoneTransform {
  translation: Vec3;
  rotation: Quat;
  scale: Vec3;
}

/**
 * Bone with its rest-pose local transform.
 * `parentTransform` places a root bone under a static, non-bone ancestor.
 */
export interface Bone extends BoneTransform {
  name: string;
  parent: number;
  parentTransform?: Mat4;
}

function copyTransform(transform: BoneTransform): BoneTransform {
  return {
    translation: [...transform.translation],
    rotation: [...transform.rotation],
    scale: [...transform.scale],
  };
}

export class Skeleton {
  private readonly bones: Bone[];
  private readonly pose: BoneTransform[];
  private readonly order: number[];
  private readonly nameToIndex = new Map<string, number>();
  private inverseBindMatrices: Mat4[] | null = null;

  constructor(bones: Bone[]) {
    if (bones.length === 0) {
      throw SkinningErrorFactory.validationError(ERROR_MESSAGES.EMPTY_SKELETON, 'bones');
    }

    this.bones = bones.map(bone => ({
      ...bone,
      ...copyTransform(bone),
      parentTransform: bone.parentTransform ? [...bone.parentTransform] : undefined,
    }));

    this.bones.forEach((bone, index) => {
      if (this.nameToIndex.has(bone.name)) {
        throw SkinningErrorFactory.validationError(
          `Duplicate bone name "${bone.name}"`,
          `bones.${index}.name`,
          { name: bone.name }
        );
      }
      this.nameToIndex.set(bone.name, index);

      if (bone.parent === index || bone.parent < SKELETON.ROOT_PARENT || bone.parent >= bones.length) {
        throw SkinningErrorFactory.validationError(
          `Bone "${bone.name}" has invalid parent ${bone.parent}`,
          `bones.${index}.parent`,
          { index, parent: bone.parent }
        );
      }
    });

    this.order = this.computeEvaluationOrder();
    this.pose = this.bones.map(copyTransform);
  }

  /**
   * Builds a skeleton from plain definitions, validated with Zod.
   */
  static fromDefinitions(definitions: BoneDefinitionInput[]): Skeleton {
    const parsed: BoneDefinition[] = parseWithSchema(
      BoneDefinitionsSchema,
      definitions,
      'bones',
      ERROR_MESSAGES.INVALID_BONES
    );
    return new Skeleton(parsed);
  }

  /**
   * Sorts bones by depth so every parent precedes its children.
   */
  private computeEvaluationOrder(): number[] {
    const depths = new Array<number>(this.bones.length).fill(-1);

    const depthOf = (index: number): number => {
      if (depths[index] >= 0) return depths[index];

      // Walk up to a root or an already-resolved ancestor
      const chain: number[] = [];
      let current = index;
      while (current !== SKELETON.ROOT_PARENT && depths[current] < 0) {
        if (chain.includes(current)) {
          throw SkinningErrorFactory.validationError(
            ERROR_MESSAGES.BONE_CYCLE,
            `bones.${index}.parent`,
            { cycle: chain.map(i => this.bones[i].name) }
          );
        }
        chain.push(current);
        current = this.bones[current].parent;
      }

      let depth = current === SKELETON.ROOT_PARENT ? -1 : depths[current];
      for (let i = chain.length - 1; i >= 0; i--) {
        depth += 1;
        depths[chain[i]] = depth;
      }
      return depths[index];
    };

    const indices = this.bones.map((_, index) => index);
    for (const index of indices) {
      depthOf(index);
    }
    return indices.sort((a, b) => depths[a] - depths[b] || a - b);
  }

  get boneCount(): number {
    return this.bones.length;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.bones.length) {
      throw SkinningErrorFactory.validationError(
        `Bone index ${index} is out of range`,
        'bone',
        { index, boneCount: this.bones.length }
      );
    }
  }

  /**
   * Rest definition of a bone
   */
  getBone(index: number): Readonly<Bone> {
    this.assertIndex(index);
    return this.bones[index];
  }

  /**
   * Index of the bone with this name, or -1
   */
  getBoneIndex(name: string): number {
    return this.nameToIndex.get(name) ?? -1;
  }

  listBoneNames(): string[] {
    return this.bones.map(bone => bone.name);
  }

  listRoots(): number[] {
    return this.bones
      .map((bone, index) => (bone.parent === SKELETON.ROOT_PARENT ? index : -1))
      .filter(index => index >= 0);
  }

  listChildren(index: number): number[] {
    this.assertIndex(index);
    return this.bones
      .map((bone, child) => (bone.parent === index ? child : -1))
      .filter(child => child >= 0);
  }

  /**
   * Current local transform of a bone
   */
  getLocalTransform(index: number): BoneTransform {
    this.assertIndex(index);
    return copyTransform(this.pose[index]);
  }

  /**
   * Overrides parts of a bone's current local transform.
   */
  setLocalTransform(index: number, transform: Partial<BoneTransform>): void {
    this.assertIndex(index);
    const current = this.pose[index];
    if (transform.translation) current.translation = [...transform.translation];
    if (transform.rotation) current.rotation = [...transform.rotation];
    if (transform.scale) current.scale = [...transform.scale];
  }

  /**
   * Restores every bone to its rest transform.
   */
  resetPose(): void {
    this.bones.forEach((bone, index) => {
      this.pose[index] = copyTransform(bone);
    });
  }

  computeLocalMatrix(index: number): Mat4 {
    this.assertIndex(index);
    const { translation, rotation, scale } = this.pose[index];
    return fromRotationTranslationScale(rotation, translation, scale);
  }

  /**
   * World matrix of every bone for the current pose, indexed like the bones.
   */
  computeWorldMatrices(): Mat4[] {
    const world: Mat4[] = new Array<Mat4>(this.bones.length);

    for (const index of this.order) {
      const bone = this.bones[index];
      const local = this.computeLocalMatrix(index);
      if (bone.parent === SKELETON.ROOT_PARENT) {
        world[index] = bone.parentTransform ? multiply(bone.parentTransform, local) : local;
      } else {
        world[index] = multiply(world[bone.parent], local);
      }
    }

    return world;
  }

  /**
   * Captures the current pose as the bind pose and stores its inverses.
   */
  bind(): void {
    const world = this.computeWorldMatrices();
    this.inverseBindMatrices = world.map((matrix, index) => {
      const inverse = invert(matrix);
      if (!inverse) {
        throw SkinningErrorFactory.validationError(
          `${ERROR_MESSAGES.SINGULAR_BIND_MATRIX}: bone "${this.bones[index].name}"`,
          `bones.${index}`,
          { matrix: formatMatrix(matrix) }
        );
      }
      return inverse;
    });
  }

  /**
   * Uses inverse bind matrices supplied by an asset instead of calling bind().
   */
  setInverseBindMatrices(matrices: ArrayLike<number>[]): void {
    if (matrices.length !== this.bones.length) {
      throw SkinningErrorFactory.validationError(
        ERROR_MESSAGES.INVERSE_BIND_COUNT,
        'inverseBindMatrices',
        { expected: this.bones.length, received: matrices.length }
      );
    }
    this.inverseBindMatrices = matrices.map((matrix, index) => {
      if (matrix.length !== 16) {
        throw SkinningErrorFactory.validationError(
          `Inverse bind matrix ${index} has ${matrix.length} elements`,
          `inverseBindMatrices.${index}`
        );
      }
      return toMat4(matrix);
    });
  }

  isBound(): boolean {
    return this.inverseBindMatrices !== null;
  }

  getInverseBindMatrices(): Mat4[] {
    return this.requireInverseBindMatrices().map(matrix => [...matrix]);
  }

  private requireInverseBindMatrices(): Mat4[] {
    if (!this.inverseBindMatrices) {
      throw SkinningErrorFactory.validationError(
        'Skeleton has no bind pose; call bind() or setInverseBindMatrices() first',
        'inverseBindMatrices'
      );
    }
    return this.inverseBindMatrices;
  }

  /**
   * Skin matrix per bone: world · inverseBind.
   * Each one maps a bind-pose vertex to where the bone's motion since the
   * bind pose carries it. In the bind pose every skin matrix is the identity.
   */
  computeSkinMatrices(): Mat4[] {
    const inverseBind = this.requireInverseBindMatrices();
    return this.computeWorldMatrices().map((world, index) => multiply(world, inverseBind[index]));
  }

  /**
   * Skin matrices packed back to back, ready for uniformMatrix4fv.
   */
  packSkinMatrices(target?: Float32Array): Float32Array {
    const matrices = this.computeSkinMatrices();
    const out = target ?? new Float32Array(matrices.length * 16);
    if (out.length < matrices.length * 16) {
      throw SkinningErrorFactory.validationError(
        `Target holds ${out.length} floats, ${matrices.length * 16} needed`,
        'target'
      );
    }
    matrices.forEach((matrix, index) => out.set(matrix, index * 16));
    return out;
  }

  /**
   * Rest definitions, in storage order
   */
  toDefinitions(): BoneDefinition[] {
    return this.bones.map(bone => ({
      name: bone.name,
      parent: bone.parent,
      ...copyTransform(bone),
      ...(bone.parentTransform ? { parentTransform: [...bone.parentTransform] } : {}),
    }));
  }

  /**
   * Independent copy including the current pose and bind pose.
   */
  clone(): Skeleton {
    const copy = new Skeleton(this.bones);
    this.pose.forEach((transform, index) => copy.setLocalTransform(index, transform));
    if (this.inverseBindMatrices) {
      copy.setInverseBindMatrices(this.inverseBindMatrices);
    }
    return copy;
  }
}
