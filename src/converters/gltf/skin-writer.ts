/**
 * glTF Skin Writer
 *
 * Builds a glTF-Transform document from a skinned model: one node per bone
 * with its rest transform, a skin with inverse bind matrices, skinned
 * primitives and one animation per clip.
 */

import { Accessor, Document, Node, NodeIO, Primitive, type GLTF, type mat4 } from '@gltf-transform/core';
import { SKELETON, SKIN_ATTRIBUTES } from '../../constants/skeleton';
import type { SkinnedMesh } from '../../core/skinned-mesh';
import type { SkinnedModel } from '../../core/skinned-model';
import { componentsFor } from '../../animation/animation-sampler';
import type { PrimitiveMode } from '../../schemas';
import { Logger } from '../../utils/logger';

const PRIMITIVE_MODES: Record<PrimitiveMode, GLTF.MeshPrimitiveMode> = {
  points: Primitive.Mode.POINTS,
  lines: Primitive.Mode.LINES,
  triangles: Primitive.Mode.TRIANGLES,
};

function toGltfMatrix(m: ArrayLike<number>): mat4 {
  return [
    m[0], m[1], m[2], m[3],
    m[4], m[5], m[6], m[7],
    m[8], m[9], m[10], m[11],
    m[12], m[13], m[14], m[15],
  ];
}

/**
 * Splits packed influence slots into VEC4 attribute arrays.
 */
function splitInfluenceSets(mesh: SkinnedMesh): Array<{ joints: Uint16Array; weights: Float32Array }> {
  const perAttribute = SKELETON.JOINTS_PER_ATTRIBUTE;
  const setCount = mesh.influencesPerVertex / perAttribute;
  const sets: Array<{ joints: Uint16Array; weights: Float32Array }> = [];

  for (let set = 0; set < setCount; set++) {
    const joints = new Uint16Array(mesh.vertexCount * perAttribute);
    const weights = new Float32Array(mesh.vertexCount * perAttribute);
    for (let vertex = 0; vertex < mesh.vertexCount; vertex++) {
      for (let slot = 0; slot < perAttribute; slot++) {
        const source = vertex * mesh.influencesPerVertex + set * perAttribute + slot;
        joints[vertex * perAttribute + slot] = mesh.joints[source];
        weights[vertex * perAttribute + slot] = mesh.weights[source];
      }
    }
    sets.push({ joints, weights });
  }

  return sets;
}

function writePrimitive(document: Document, mesh: SkinnedMesh): Primitive {
  const buffer = document.getRoot().listBuffers()[0];
  const accessor = (name: string, type: GLTF.AccessorType, array: Float32Array | Uint16Array | Uint32Array): Accessor =>
    document.createAccessor(`${mesh.name}_${name}`).setType(type).setArray(array).setBuffer(buffer);

  const primitive = document.createPrimitive()
    .setMode(PRIMITIVE_MODES[mesh.mode])
    .setAttribute(SKIN_ATTRIBUTES.POSITION, accessor('position', Accessor.Type.VEC3, mesh.positions));

  if (mesh.normals) {
    primitive.setAttribute(SKIN_ATTRIBUTES.NORMAL, accessor('normal', Accessor.Type.VEC3, mesh.normals));
  }

  splitInfluenceSets(mesh).forEach((set, index) => {
    primitive.setAttribute(SKIN_ATTRIBUTES.JOINTS[index], accessor(`joints_${index}`, Accessor.Type.VEC4, set.joints));
    primitive.setAttribute(SKIN_ATTRIBUTES.WEIGHTS[index], accessor(`weights_${index}`, Accessor.Type.VEC4, set.weights));
  });

  if (mesh.indices) {
    primitive.setIndices(accessor('indices', Accessor.Type.SCALAR, mesh.indices));
  }

  return primitive;
}

/**
 * Creates a document holding the model's skeleton, meshes and clips.
 */
export function writeSkinnedModel(model: SkinnedModel, logger: Logger): Document {
  const document = new Document();
  const buffer = document.createBuffer();
  const scene = document.createScene(model.name);
  const { skeleton } = model;

  const jointNodes: Node[] = skeleton.toDefinitions().map(bone =>
    document.createNode(bone.name)
      .setTranslation(bone.translation)
      .setRotation(bone.rotation)
      .setScale(bone.scale)
  );

  skeleton.toDefinitions().forEach((bone, index) => {
    if (bone.parent !== SKELETON.ROOT_PARENT) {
      jointNodes[bone.parent].addChild(jointNodes[index]);
      return;
    }
    if (bone.parentTransform) {
      const holder = document.createNode(`${bone.name}_parent`).setMatrix(toGltfMatrix(bone.parentTransform));
      holder.addChild(jointNodes[index]);
      scene.addChild(holder);
    } else {
      scene.addChild(jointNodes[index]);
    }
  });

  const inverseBind = new Float32Array(skeleton.boneCount * 16);
  skeleton.getInverseBindMatrices().forEach((matrix, index) => inverseBind.set(matrix, index * 16));

  const skin = document.createSkin(`${model.name}_skin`)
    .setInverseBindMatrices(
      document.createAccessor(`${model.name}_inverseBindMatrices`)
        .setType(Accessor.Type.MAT4)
        .setArray(inverseBind)
        .setBuffer(buffer)
    );
  jointNodes.forEach(node => skin.addJoint(node));
  const firstRoot = skeleton.listRoots()[0];
  if (firstRoot !== undefined) {
    skin.setSkeleton(jointNodes[firstRoot]);
  }

  const mesh = document.createMesh(model.name);
  model.meshes.forEach(skinnedMesh => mesh.addPrimitive(writePrimitive(document, skinnedMesh)));

  scene.addChild(
    document.createNode(model.name).setMesh(mesh).setSkin(skin)
  );

  for (const clip of model.clips) {
    const animation = document.createAnimation(clip.name);
    clip.tracks.forEach((track, index) => {
      const components = componentsFor(track.path);
      const sampler = document.createAnimationSampler()
        .setInput(
          document.createAccessor(`${clip.name}_${index}_times`)
            .setType(Accessor.Type.SCALAR)
            .setArray(Float32Array.from(track.times))
            .setBuffer(buffer)
        )
        .setOutput(
          document.createAccessor(`${clip.name}_${index}_values`)
            .setType(components === 4 ? Accessor.Type.VEC4 : Accessor.Type.VEC3)
            .setArray(Float32Array.from(track.values))
            .setBuffer(buffer)
        )
        .setInterpolation(track.interpolation);
      const channel = document.createAnimationChannel()
        .setTargetNode(jointNodes[track.bone])
        .setTargetPath(track.path)
        .setSampler(sampler);
      animation.addSampler(sampler).addChannel(channel);
    });
  }

  logger.info(`Wrote glTF document for "${model.name}"`, {
    joints: skeleton.boneCount,
    primitives: model.meshes.length,
    animations: model.clips.length,
  });

  return document;
}

/**
 * Serializes a skinned model as GLB bytes.
 */
export async function exportGlb(model: SkinnedModel, logger: Logger): Promise<Uint8Array> {
  const document = writeSkinnedModel(model, logger);
  return new NodeIO().writeBinary(document);
}
