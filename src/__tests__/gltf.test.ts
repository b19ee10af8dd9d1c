import { describe, it, expect, vi, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Document, NodeIO, Primitive, type GLTF, type Node } from '@gltf-transform/core';
import { importSkinnedModels } from '../converters/gltf/skin-importer';
import { readSkinnedModels } from '../converters/gltf/skin-reader';
import { exportGlb, writeSkinnedModel } from '../converters/gltf/skin-writer';
import { preprocessGltfDocument } from '../converters/helpers/gltf-transform-helpers';
import { GltfParserFactory } from '../converters/parsers/gltf-parser-factory';
import { sampleTrack } from '../animation/animation-sampler';
import { listInfluences } from '../core/skinned-mesh';
import { createLineMeshDemo, toSkinnedModel } from '../demo/line-mesh-demo';
import { SkinningFileSystemError, SkinningImportError } from '../errors';
import { SkinningConfigSchema } from '../schemas';
import { isIdentity } from '../utils/matrix-utils';
import { LogLevel, createLogger } from '../utils/logger';
import { expectClose } from './helpers';

const logger = createLogger({ level: LogLevel.ERROR });

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

interface TestDocumentOptions {
  inverseBind?: boolean;
  weights?: boolean;
  holder?: boolean;
  unskinnedPrimitive?: boolean;
  position?: boolean;
  mode?: GLTF.MeshPrimitiveMode;
}

/**
 * One joint, one triangle rigidly bound to it.
 */
function buildDocument(options: TestDocumentOptions = {}): Document {
  const {
    inverseBind = true,
    weights = true,
    holder = false,
    unskinnedPrimitive = false,
    position = true,
    mode = Primitive.Mode.TRIANGLES,
  } = options;
  const document = new Document();
  const buffer = document.createBuffer();
  const accessor = (type: GLTF.AccessorType, array: Float32Array | Uint16Array) =>
    document.createAccessor().setType(type).setArray(array).setBuffer(buffer);

  const scene = document.createScene('scene');
  const joint = document.createNode('joint').setTranslation([0, 1, 0]);
  if (holder) {
    scene.addChild(document.createNode('holder').setTranslation([0, 0, 5]).addChild(joint));
  } else {
    scene.addChild(joint);
  }

  const skin = document.createSkin('skin').addJoint(joint);
  if (inverseBind) {
    skin.setInverseBindMatrices(accessor('MAT4', new Float32Array([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, -1, 0, 1])));
  }

  const primitive = document.createPrimitive()
    .setMode(mode)
    .setAttribute('JOINTS_0', accessor('VEC4', new Uint16Array(12)));
  if (position) {
    primitive.setAttribute('POSITION', accessor('VEC3', new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0])));
  }
  if (weights) {
    primitive.setAttribute('WEIGHTS_0', accessor('VEC4', new Float32Array([1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0])));
  }

  const mesh = document.createMesh('tri');
  if (unskinnedPrimitive) {
    mesh.addPrimitive(document.createPrimitive().setAttribute('POSITION', accessor('VEC3', new Float32Array(9))));
  }
  mesh.addPrimitive(primitive);

  scene.addChild(document.createNode('body').setMesh(mesh).setSkin(skin));
  return document;
}

function findNode(document: Document, name: string): Node {
  const node = document.getRoot().listNodes().find(candidate => candidate.getName() === name);
  if (!node) throw new Error(`No node named ${name}`);
  return node;
}

describe('readSkinnedModels', () => {
  it('reads skeleton, mesh and inverse bind matrices', () => {
    const [model] = readSkinnedModels(buildDocument(), { logger });
    expect(model.name).toBe('body');
    expect(model.skeleton.listBoneNames()).toEqual(['joint']);
    expectClose(model.skeleton.getInverseBindMatrices()[0].slice(12, 15), [0, -1, 0]);
    expect(isIdentity(model.skeleton.computeSkinMatrices()[0])).toBe(true);

    const [mesh] = model.meshes;
    expect(mesh.name).toBe('tri');
    expect(mesh.vertexCount).toBe(3);
    expect(mesh.mode).toBe('triangles');
    expect(listInfluences(mesh)).toEqual([
      { joints: [0], weights: [1] },
      { joints: [0], weights: [1] },
      { joints: [0], weights: [1] },
    ]);
  });

  it('uses identity inverse bind matrices when the skin has none', () => {
    const warn = vi.spyOn(logger, 'warn');
    const [model] = readSkinnedModels(buildDocument({ inverseBind: false }), { logger });
    expect(isIdentity(model.skeleton.getInverseBindMatrices()[0])).toBe(true);
    expect(warn).toHaveBeenCalledWith('Skin has no inverse bind matrices, using identity', { skin: 'skin' });
    warn.mockRestore();
  });

  it('keeps a non-joint ancestor as the root parent transform', () => {
    const [model] = readSkinnedModels(buildDocument({ holder: true }), { logger });
    const parentTransform = model.skeleton.getBone(0).parentTransform;
    expect(parentTransform).toBeDefined();
    expectClose(parentTransform?.slice(12, 15) ?? [], [0, 0, 5]);
  });

  it('skips primitives without joints', () => {
    const [model] = readSkinnedModels(buildDocument({ unskinnedPrimitive: true }), { logger });
    expect(model.meshes).toHaveLength(1);
    expect(model.meshes[0].name).toBe('tri_1');
  });

  it('fails on JOINTS_0 without WEIGHTS_0', () => {
    let caught: unknown;
    try {
      readSkinnedModels(buildDocument({ weights: false }), { logger });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SkinningImportError);
    if (caught instanceof SkinningImportError) {
      expect(caught.stage).toBe('primitive_attributes');
      expect(caught.message).toBe('Primitive is missing a required attribute: WEIGHTS_0');
    }
  });

  it('merges JOINTS_1 and WEIGHTS_1 into the vertex influences', () => {
    const document = new Document();
    const buffer = document.createBuffer();
    const accessor = (type: GLTF.AccessorType, array: Float32Array | Uint16Array) =>
      document.createAccessor().setType(type).setArray(array).setBuffer(buffer);

    const tip = document.createNode('tip').setTranslation([1, 0, 0]);
    const base = document.createNode('base').addChild(tip);
    const skin = document.createSkin('pair').addJoint(base).addJoint(tip);
    const primitive = document.createPrimitive()
      .setAttribute('POSITION', accessor('VEC3', new Float32Array([0, 0, 0])))
      .setAttribute('JOINTS_0', accessor('VEC4', new Uint16Array([0, 0, 0, 0])))
      .setAttribute('WEIGHTS_0', accessor('VEC4', new Float32Array([0.75, 0, 0, 0])))
      .setAttribute('JOINTS_1', accessor('VEC4', new Uint16Array([1, 0, 0, 0])))
      .setAttribute('WEIGHTS_1', accessor('VEC4', new Float32Array([0.25, 0, 0, 0])));
    document.createScene().addChild(base).addChild(
      document.createNode('body').setMesh(document.createMesh('point').addPrimitive(primitive)).setSkin(skin)
    );

    const [model] = readSkinnedModels(document, { logger, influences: { maxInfluences: 8 } });
    expect(model.meshes[0].influencesPerVertex).toBe(8);
    expect(listInfluences(model.meshes[0])).toEqual([{ joints: [0, 1], weights: [0.75, 0.25] }]);
  });

  it('fails on a skinned primitive without POSITION', () => {
    let caught: unknown;
    try {
      readSkinnedModels(buildDocument({ position: false }), { logger });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SkinningImportError);
    if (caught instanceof SkinningImportError) {
      expect(caught.stage).toBe('primitive_attributes');
      expect(caught.message).toBe('Primitive is missing a required attribute: POSITION');
    }
  });

  it('skips primitives with an unsupported mode', () => {
    const warn = vi.spyOn(logger, 'warn');
    const models = readSkinnedModels(buildDocument({ mode: Primitive.Mode.TRIANGLE_STRIP }), { logger });
    expect(models).toEqual([]);
    expect(warn).toHaveBeenCalledWith('Primitive mode is not supported, skipping', { mesh: 'tri', mode: 5 });
    warn.mockRestore();
  });

  it('skips a skin without joints', () => {
    const document = new Document();
    const position = document.createAccessor()
      .setType('VEC3')
      .setArray(new Float32Array([0, 0, 0]))
      .setBuffer(document.createBuffer());
    const mesh = document.createMesh('lonely').addPrimitive(document.createPrimitive().setAttribute('POSITION', position));
    document.createScene().addChild(document.createNode('body').setMesh(mesh).setSkin(document.createSkin('empty')));

    const warn = vi.spyOn(logger, 'warn');
    expect(readSkinnedModels(document, { logger })).toEqual([]);
    expect(warn).toHaveBeenCalledWith('Skin has no joints, skipping', { skin: 'empty', node: 'body' });
    warn.mockRestore();
  });

  it('returns nothing for a document without skins', () => {
    const document = new Document();
    document.createScene().addChild(document.createNode('empty'));
    expect(readSkinnedModels(document, { logger })).toEqual([]);
  });
});

describe('writeSkinnedModel', () => {
  it('round-trips the demo rig through a document', () => {
    const demo = createLineMeshDemo();
    const [model] = readSkinnedModels(writeSkinnedModel(toSkinnedModel(demo), logger), { logger });

    expect(model.name).toBe('LineMeshDemo');
    expect(model.skeleton.listBoneNames()).toEqual(['bone0', 'bone1', 'bone2']);
    expect(model.skeleton.getBone(2).parent).toBe(1);
    expectClose(model.skeleton.getBone(2).translation, [4, 0, 0]);
    expectClose(model.skeleton.getInverseBindMatrices()[2].slice(12, 15), [-8, 0, 0]);

    const [mesh] = model.meshes;
    expect(mesh.vertexCount).toBe(10);
    expect(mesh.mode).toBe('lines');
    expect(mesh.indices?.length).toBe(26);
    expect(Array.from(mesh.positions)).toEqual(Array.from(demo.mesh.positions));
    expect(listInfluences(mesh)[2]).toEqual({ joints: [0, 1], weights: [0.5, 0.5] });

    expect(model.clips.map(clip => clip.name)).toEqual(['swing']);
    expect(model.clips[0].listBones()).toEqual([0, 1, 2]);
    expect(model.clips[0].duration).toBeCloseTo(2 * Math.PI, 5);
  });

  it('writes a holder node for a root parent transform', () => {
    const [source] = readSkinnedModels(buildDocument({ holder: true }), { logger });
    const document = writeSkinnedModel(source, logger);
    const holder = document.getRoot().listNodes().find(node => node.getName() === 'joint_parent');
    expect(holder).toBeDefined();
    expectClose(holder?.getTranslation() ?? [], [0, 0, 5]);
  });

  it('exports GLB bytes that read back', async () => {
    const glb = await exportGlb(toSkinnedModel(createLineMeshDemo()), logger);
    const document = await new NodeIO().readBinary(glb);
    const [model] = readSkinnedModels(document, { logger });
    expect(model.skeleton.boneCount).toBe(3);
    expect(model.meshes[0].vertexCount).toBe(10);
  });
});

describe('preprocessGltfDocument', () => {
  it('resamples away redundant animation keys', async () => {
    const document = buildDocument();
    const buffer = document.getRoot().listBuffers()[0];
    const sampler = document.createAnimationSampler()
      .setInput(document.createAccessor().setType('SCALAR').setArray(new Float32Array([0, 1, 2, 3])).setBuffer(buffer))
      .setOutput(document.createAccessor().setType('VEC3').setArray(new Float32Array([
        0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1, 0,
      ])).setBuffer(buffer))
      .setInterpolation('LINEAR');
    const channel = document.createAnimationChannel()
      .setTargetNode(findNode(document, 'joint'))
      .setTargetPath('translation')
      .setSampler(sampler);
    document.createAnimation('hold').addSampler(sampler).addChannel(channel);

    await preprocessGltfDocument(document, { dequantize: false, resample: true }, logger);

    const [model] = readSkinnedModels(document, { logger });
    const [track] = model.clips[0].tracks;
    expect(track.times.length).toBeLessThan(4);
    expect(track.times[0]).toBe(0);
    expectClose(sampleTrack(track, 1.5), [0, 1, 0]);
  });
});

describe('importSkinnedModels', () => {
  const config = SkinningConfigSchema.parse({});
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'skinkit-'));

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('imports from a GLB buffer', async () => {
    const glb = await exportGlb(toSkinnedModel(createLineMeshDemo()), logger);
    const models = await importSkinnedModels(toArrayBuffer(glb), config, logger);
    expect(models.map(model => model.name)).toEqual(['LineMeshDemo']);
  });

  it('imports from a .glb path', async () => {
    const filePath = path.join(tmpDir, 'rig.glb');
    fs.writeFileSync(filePath, await exportGlb(toSkinnedModel(createLineMeshDemo()), logger));
    const models = await importSkinnedModels(filePath, config, logger);
    expect(models[0].meshes[0].vertexCount).toBe(10);
  });

  it('limits influences as configured', async () => {
    const glb = await exportGlb(toSkinnedModel(createLineMeshDemo()), logger);
    const [model] = await importSkinnedModels(toArrayBuffer(glb), { ...config, maxInfluences: 1 }, logger);
    // 0.5 / 0.5 tie keeps the lower joint
    expect(listInfluences(model.meshes[0])[2]).toEqual({ joints: [0], weights: [1] });
  });

  it('rejects unreadable bytes as an import error', async () => {
    await expect(importSkinnedModels(new ArrayBuffer(8), config, logger)).rejects.toBeInstanceOf(SkinningImportError);
  });
});

describe('GltfParserFactory', () => {
  it('picks the GLB parser for buffers', () => {
    expect(GltfParserFactory.createParser(new ArrayBuffer(0)).getType()).toBe('GLB');
  });

  it('rejects a missing file', () => {
    expect(() => GltfParserFactory.createParser('/definitely/missing/model.glb')).toThrow(SkinningFileSystemError);
  });

  it('rejects an unsupported extension', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'skinkit-'));
    const filePath = path.join(dir, 'model.obj');
    fs.writeFileSync(filePath, 'v 0 0 0');
    try {
      expect(() => GltfParserFactory.createParser(filePath)).toThrow('Unsupported file format: .obj');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
