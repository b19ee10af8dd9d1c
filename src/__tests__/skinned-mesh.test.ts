import { describe, it, expect } from 'vitest';
import { buildSkinnedMesh, createSkinnedMesh, listInfluences, maxReferencedJoint } from '../core/skinned-mesh';
import { SkinningSchemaError, SkinningValidationError } from '../errors';
import { skinVertex, skinVertices } from '../skinning/linear-blend-skinning';
import { createIdentity, fromRotationZ, fromTranslation } from '../utils/matrix-utils';
import { expectClose } from './helpers';

const rigid = { joints: [0], weights: [1] };

describe('createSkinnedMesh', () => {
  it('pads 2D positions and packs influences', () => {
    const mesh = createSkinnedMesh({
      dimensions: 2,
      positions: [0, 0, 1, 0],
      influences: [rigid, { joints: [0, 1], weights: [1, 1] }],
      indices: [0, 1],
      mode: 'lines',
    });
    expect(mesh.name).toBe('SkinnedMesh');
    expect(mesh.vertexCount).toBe(2);
    expect(Array.from(mesh.positions)).toEqual([0, 0, 0, 1, 0, 0]);
    expect(mesh.influencesPerVertex).toBe(4);
    expect(Array.from(mesh.weights)).toEqual([1, 0, 0, 0, 0.5, 0.5, 0, 0]);
    expect(mesh.indices).toBeInstanceOf(Uint16Array);
    expect(mesh.mode).toBe('lines');
  });

  it('uses two attribute sets for more than four influences', () => {
    const mesh = createSkinnedMesh({ positions: [0, 0, 0], influences: [rigid] }, { maxInfluences: 8 });
    expect(mesh.influencesPerVertex).toBe(8);
    expect(mesh.joints.length).toBe(8);
  });

  it('rejects an influence count that does not match the vertices', () => {
    expect(() => createSkinnedMesh({ positions: [0, 0, 0, 1, 1, 1], influences: [rigid] }))
      .toThrow(SkinningSchemaError);
  });

  it('rejects indices past the last vertex', () => {
    expect(() => createSkinnedMesh({ positions: [0, 0, 0], influences: [rigid], indices: [0, 1] }))
      .toThrow('Index 1 is out of range for 1 vertices');
  });

  it('checks joints against the bone count', () => {
    expect(() => createSkinnedMesh({ positions: [0, 0, 0], influences: [{ joints: [2], weights: [1] }] }, {}, 2))
      .toThrow(SkinningValidationError);
  });

  it('switches to 32-bit indices past 65535 vertices', () => {
    const vertexCount = 65537;
    const mesh = buildSkinnedMesh({
      name: 'large',
      dimensions: 3,
      positions: new Float32Array(vertexCount * 3),
      influences: Array.from({ length: vertexCount }, () => rigid),
      indices: [0, 65536],
      mode: 'points',
    });
    expect(mesh.indices).toBeInstanceOf(Uint32Array);
  });

  it('lists influences and the highest joint used', () => {
    const mesh = createSkinnedMesh({
      positions: [0, 0, 0, 1, 0, 0],
      influences: [rigid, { joints: [3, 1], weights: [0.75, 0.25] }],
    });
    expect(listInfluences(mesh)).toEqual([rigid, { joints: [3, 1], weights: [0.75, 0.25] }]);
    expect(maxReferencedJoint(mesh)).toBe(3);
  });
});

describe('linear blend skinning', () => {
  const mesh = createSkinnedMesh({
    positions: [1, 0, 0, 1, 0, 0, 5, 5, 5],
    normals: [1, 0, 0, 1, 0, 0, 0, 0, 1],
    influences: [rigid, { joints: [0, 1], weights: [0.5, 0.5] }, { joints: [], weights: [] }],
  });

  it('leaves vertices in place with identity skin matrices', () => {
    const result = skinVertices(mesh, [createIdentity(), createIdentity()]);
    expect(Array.from(result.positions)).toEqual(Array.from(mesh.positions));
  });

  it('blends bone transforms by weight', () => {
    const result = skinVertices(mesh, [createIdentity(), fromTranslation([0, 2, 0])]);
    expectClose(result.positions.slice(0, 6), [1, 0, 0, 1, 1, 0]);
  });

  it('keeps weightless vertices at their bind position', () => {
    const result = skinVertices(mesh, [fromTranslation([9, 9, 9]), fromTranslation([9, 9, 9])]);
    expectClose(result.positions.slice(6, 9), [5, 5, 5]);
  });

  it('rotates and renormalizes normals', () => {
    const result = skinVertices(mesh, [fromRotationZ(Math.PI / 2), fromTranslation([3, 0, 0])]);
    expect(result.normals).toBeDefined();
    if (!result.normals) return;
    expectClose(result.normals.slice(0, 3), [0, 1, 0]);
    // Half rotated, half untouched: (0.5, 0.5, 0) renormalized
    expectClose(result.normals.slice(3, 6), [Math.SQRT1_2, Math.SQRT1_2, 0]);
    expectClose(result.normals.slice(6, 9), [0, 0, 1]);
  });

  it('writes into a supplied target', () => {
    const target = new Float32Array(9);
    const result = skinVertices(mesh, [createIdentity(), createIdentity()], target);
    expect(result.positions).toBe(target);
  });

  it('skins a single vertex', () => {
    expectClose(skinVertex(mesh, 1, [createIdentity(), fromTranslation([0, 2, 0])]), [1, 1, 0]);
    expect(skinVertex(mesh, 2, [createIdentity(), fromTranslation([1, 1, 1])])).toEqual([5, 5, 5]);
  });

  it('rejects a palette missing a referenced bone', () => {
    expect(() => skinVertices(mesh, [createIdentity()])).toThrow(SkinningValidationError);
  });

  it('rejects a vertex out of range', () => {
    expect(() => skinVertex(mesh, 3, [createIdentity(), createIdentity()])).toThrow('Vertex 3 is out of range');
  });
});
