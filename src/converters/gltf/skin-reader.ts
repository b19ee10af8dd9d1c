/**
 * glTF Skin Reader
 *
 * Turns skinned nodes of a glTF-Transform document into skinned models.
 * Handles joint hierarchies, inverse bind matrices, JOINTS_n/WEIGHTS_n
 * attributes and joint animations.
 */

import { Accessor, Animation, Document, Node, Primitive, Skin } from '@gltf-transform/core';
import { SKELETON, SKIN_ATTRIBUTES } from '../../constants/skeleton';
import { ERROR_MESSAGES } from '../../constants/errors';
import { SkinningErrorFactory } from '../../errors';
import { Skeleton, type Bone } from '../../core/skeleton';
import { buildSkinnedMesh, type SkinnedMesh } from '../../core/skinned-mesh';
import type { SkinnedModel } from '../../core/skinned-model';
import { AnimationClip } from '../../animation/animation-clip';
import type { AnimationTrack } from '../../animation/animation-sampler';
import type { InfluenceOptions, PrimitiveMode, VertexInfluence } from '../../schemas';
import { Logger } from '../../utils/logger';
import { makeUniqueNames } from '../../utils/name-utils';

/**
 * Import stage names, reported on SkinningImportError
 */
export const IMPORT_STAGES = {
  INVERSE_BIND_MATRICES: 'inverse_bind_matrices',
  PRIMITIVE_ATTRIBUTES: 'primitive_attributes',
  ANIMATIONS: 'animations',
} as const;

export interface SkinReaderOptions {
  influences?: Partial<InfluenceOptions>;
  logger: Logger;
}

/**
 * Reads every element of an accessor into a flat array.
 * getElement() denormalizes normalized integer accessors.
 */
export function readAccessor(accessor: Accessor): number[] {
  const size = accessor.getElementSize();
  const count = accessor.getCount();
  const out = new Array<number>(size * count);
  const element = new Array<number>(size);
  for (let i = 0; i < count; i++) {
    accessor.getElement(i, element);
    for (let c = 0; c < size; c++) {
      out[i * size + c] = element[c];
    }
  }
  return out;
}

/**
 * Maps every node to the node that lists it as a child.
 * glTF-Transform nodes are found through their parents' child lists.
 */
function buildParentMap(document: Document): Map<Node, Node> {
  const parents = new Map<Node, Node>();
  for (const node of document.getRoot().listNodes()) {
    for (const child of node.listChildren()) {
      parents.set(child, node);
    }
  }
  return parents;
}

/**
 * Builds a skeleton from a skin's joints and inverse bind matrices.
 */
export function readSkeleton(skin: Skin, parents: Map<Node, Node>, logger: Logger): Skeleton {
  const joints = skin.listJoints();
  const names = makeUniqueNames(joints.map(joint => joint.getName()), 'joint');

  const bones: Bone[] = joints.map((joint, index) => {
    const parentNode = parents.get(joint);
    const parent = parentNode ? joints.indexOf(parentNode) : SKELETON.ROOT_PARENT;
    const bone: Bone = {
      name: names[index],
      parent,
      translation: joint.getTranslation(),
      rotation: joint.getRotation(),
      scale: joint.getScale(),
    };

    // A root joint under a non-joint node keeps that node's world transform
    if (parent === SKELETON.ROOT_PARENT && parentNode) {
      bone.parentTransform = [...parentNode.getWorldMatrix()];
    }
    return bone;
  });

  const skeleton = new Skeleton(bones);

  const inverseBindAccessor = skin.getInverseBindMatrices();
  if (inverseBindAccessor) {
    if (inverseBindAccessor.getCount() !== joints.length) {
      throw SkinningErrorFactory.importError(
        ERROR_MESSAGES.INVERSE_BIND_COUNT,
        IMPORT_STAGES.INVERSE_BIND_MATRICES,
        { skin: skin.getName(), expected: joints.length, received: inverseBindAccessor.getCount() }
      );
    }
    const matrices: number[][] = [];
    for (let i = 0; i < joints.length; i++) {
      matrices.push(inverseBindAccessor.getElement(i, new Array<number>(16)));
    }
    skeleton.setInverseBindMatrices(matrices);
  } else {
    // glTF: a missing accessor means identity inverse bind matrices
    logger.warn('Skin has no inverse bind matrices, using identity', { skin: skin.getName() });
    skeleton.setInverseBindMatrices(joints.map(() => [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1]));
  }

  logger.info(`Read skeleton with ${joints.length} joints`, {
    skin: skin.getName(),
    roots: skeleton.listRoots().map(index => names[index]),
  });

  return skeleton;
}

function toPrimitiveMode(mode: number): PrimitiveMode | null {
  switch (mode) {
    case Primitive.Mode.POINTS:
      return 'points';
    case Primitive.Mode.LINES:
      return 'lines';
    case Primitive.Mode.TRIANGLES:
      return 'triangles';
    default:
      return null;
  }
}

/**
 * Gathers influences from every JOINTS_n/WEIGHTS_n pair present.
 */
function readInfluences(primitive: Primitive, vertexCount: number, meshName: string): VertexInfluence[] {
  const influences: VertexInfluence[] = Array.from({ length: vertexCount }, () => ({ joints: [], weights: [] }));

  SKIN_ATTRIBUTES.JOINTS.forEach((jointsSemantic, set) => {
    const jointsAccessor = primitive.getAttribute(jointsSemantic);
    if (!jointsAccessor) return;

    const weightsSemantic = SKIN_ATTRIBUTES.WEIGHTS[set];
    const weightsAccessor = primitive.getAttribute(weightsSemantic);
    if (!weightsAccessor) {
      throw SkinningErrorFactory.importError(
        `${ERROR_MESSAGES.MISSING_ATTRIBUTE}: ${weightsSemantic}`,
        IMPORT_STAGES.PRIMITIVE_ATTRIBUTES,
        { mesh: meshName, attribute: weightsSemantic }
      );
    }

    const joints = readAccessor(jointsAccessor);
    const weights = readAccessor(weightsAccessor);
    const size = jointsAccessor.getElementSize();
    for (let vertex = 0; vertex < vertexCount; vertex++) {
      for (let slot = 0; slot < size; slot++) {
        const weight = weights[vertex * size + slot];
        if (weight > 0) {
          influences[vertex].joints.push(joints[vertex * size + slot]);
          influences[vertex].weights.push(weight);
        }
      }
    }
  });

  return influences;
}

/**
 * Reads one skinned primitive. Returns null for primitives that carry no
 * skinning data or use an unsupported topology.
 */
export function readSkinnedPrimitive(
  primitive: Primitive,
  name: string,
  boneCount: number,
  options: SkinReaderOptions
): SkinnedMesh | null {
  if (!primitive.getAttribute(SKIN_ATTRIBUTES.JOINTS[0])) {
    options.logger.warn('Primitive has no JOINTS_0, skipping', { mesh: name });
    return null;
  }

  const mode = toPrimitiveMode(primitive.getMode());
  if (!mode) {
    options.logger.warn('Primitive mode is not supported, skipping', { mesh: name, mode: primitive.getMode() });
    return null;
  }

  const position = primitive.getAttribute(SKIN_ATTRIBUTES.POSITION);
  if (!position) {
    throw SkinningErrorFactory.importError(
      `${ERROR_MESSAGES.MISSING_ATTRIBUTE}: POSITION`,
      IMPORT_STAGES.PRIMITIVE_ATTRIBUTES,
      { mesh: name, attribute: SKIN_ATTRIBUTES.POSITION }
    );
  }

  const vertexCount = position.getCount();
  const normal = primitive.getAttribute(SKIN_ATTRIBUTES.NORMAL);
  const indices = primitive.getIndices();

  return buildSkinnedMesh(
    {
      name,
      dimensions: 3,
      positions: readAccessor(position),
      normals: normal ? readAccessor(normal) : undefined,
      influences: readInfluences(primitive, vertexCount, name),
      indices: indices ? readAccessor(indices) : undefined,
      mode,
    },
    options.influences,
    boneCount
  );
}

/**
 * Converts animation channels that target the skin's joints into clips.
 */
export function readClips(document: Document, joints: Node[], logger: Logger): AnimationClip[] {
  const animations = document.getRoot().listAnimations();
  const names = makeUniqueNames(animations.map(animation => animation.getName()), 'Animation');
  const clips: AnimationClip[] = [];

  animations.forEach((animation: Animation, index: number) => {
    const tracks: AnimationTrack[] = [];

    for (const channel of animation.listChannels()) {
      const target = channel.getTargetNode();
      const path = channel.getTargetPath();
      const sampler = channel.getSampler();
      if (!target || !sampler) continue;
      if (path !== 'translation' && path !== 'rotation' && path !== 'scale') continue;

      const bone = joints.indexOf(target);
      if (bone < 0) continue;

      const input = sampler.getInput();
      const output = sampler.getOutput();
      if (!input || !output) {
        throw SkinningErrorFactory.importError(
          'Animation sampler is missing input or output',
          IMPORT_STAGES.ANIMATIONS,
          { animation: names[index] }
        );
      }

      tracks.push({
        bone,
        path,
        times: readAccessor(input),
        values: readAccessor(output),
        interpolation: sampler.getInterpolation(),
      });
    }

    if (tracks.length === 0) return;

    const clip = new AnimationClip(names[index], tracks);
    logger.info(`Read clip "${clip.name}"`, {
      tracks: tracks.length,
      duration: clip.duration,
    });
    clips.push(clip);
  });

  return clips;
}

/**
 * Reads one model per node that has both a skin and a mesh.
 */
export function readSkinnedModels(document: Document, options: SkinReaderOptions): SkinnedModel[] {
  const { logger } = options;
  const root = document.getRoot();
  const parents = buildParentMap(document);
  const models: SkinnedModel[] = [];
  const skeletons = new Map<Skin, Skeleton>();

  const skinnedNodes = root.listNodes().filter(node => node.getSkin() && node.getMesh());
  if (skinnedNodes.length === 0) {
    logger.info('No skinned meshes found in glTF document');
    return models;
  }

  const modelNames = makeUniqueNames(
    skinnedNodes.map(node => node.getName() || node.getMesh()?.getName()),
    'SkinnedModel'
  );

  skinnedNodes.forEach((node, index) => {
    const skin = node.getSkin();
    const mesh = node.getMesh();
    if (!skin || !mesh) return;

    if (skin.listJoints().length === 0) {
      logger.warn('Skin has no joints, skipping', { skin: skin.getName(), node: node.getName() });
      return;
    }

    const skeleton = skeletons.get(skin) ?? readSkeleton(skin, parents, logger);
    skeletons.set(skin, skeleton);

    const primitiveNames = makeUniqueNames(
      mesh.listPrimitives().map(() => mesh.getName() || modelNames[index]),
      'Primitive'
    );
    const meshes = mesh.listPrimitives()
      .map((primitive, p) => readSkinnedPrimitive(primitive, primitiveNames[p], skeleton.boneCount, options))
      .filter((primitive): primitive is SkinnedMesh => primitive !== null);

    if (meshes.length === 0) {
      logger.warn('Skinned node has no usable primitives, skipping', { node: node.getName() });
      return;
    }

    models.push({
      name: modelNames[index],
      skeleton: skeleton.clone(),
      meshes,
      clips: readClips(document, skin.listJoints(), logger),
    });
  });

  logger.info(`Read ${models.length} skinned model(s)`);
  return models;
}
