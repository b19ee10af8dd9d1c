import { describe, it, expect } from 'vitest';
import { listInfluences } from '../core/skinned-mesh';
import { createLineMeshDemo, evaluateLineMeshDemo, toSkinnedModel } from '../demo/line-mesh-demo';
import { SkinningSchemaError } from '../errors';
import { expectClose } from './helpers';

describe('line mesh demo', () => {
  it('builds a ten vertex strip over three bones', () => {
    const demo = createLineMeshDemo();
    expect(demo.mesh.vertexCount).toBe(10);
    expect(demo.mesh.mode).toBe('lines');
    expect(demo.skeleton.listBoneNames()).toEqual(['bone0', 'bone1', 'bone2']);
    expect(demo.skeleton.isBound()).toBe(true);
    expectClose(demo.mesh.positions.slice(0, 6), [0, 1, 0, 0, -1, 0]);
    expectClose(demo.mesh.positions.slice(27, 30), [8, -1, 0]);
  });

  it('weights columns across neighbouring bones', () => {
    const influences = listInfluences(createLineMeshDemo().mesh);
    expect(influences.filter((_, vertex) => vertex % 2 === 0)).toEqual([
      { joints: [0], weights: [1] },
      { joints: [0, 1], weights: [0.5, 0.5] },
      { joints: [1], weights: [1] },
      { joints: [1, 2], weights: [0.5, 0.5] },
      { joints: [2], weights: [1] },
    ]);
  });

  it('draws the strip outline and its rungs', () => {
    const indices = Array.from(createLineMeshDemo().mesh.indices ?? []);
    expect(indices.slice(0, 4)).toEqual([0, 2, 1, 3]);
    expect(indices.slice(-2)).toEqual([8, 9]);
    expect(indices).toHaveLength(26);
  });

  it('rests at the bind pose when the angle is zero', () => {
    const demo = createLineMeshDemo();
    const { positions } = evaluateLineMeshDemo(demo, 0);
    expectClose(positions, Array.from(demo.mesh.positions));
  });

  it('bends the strip with every bone at a quarter turn', () => {
    // amplitude π/2 at sin(π/2) = 1 puts every bone at 90°
    const demo = createLineMeshDemo({ amplitude: Math.PI / 2 });
    const { positions } = evaluateLineMeshDemo(demo, Math.PI / 2);

    expectClose(positions.slice(0, 3), [-1, 0, 0]);
    expectClose(positions.slice(6, 9), [0.5, 2.5, 0]);
    expectClose(positions.slice(12, 15), [0, 3, 0]);
    expectClose(positions.slice(24, 27), [-3, 4, 0]);
    expectClose(positions.slice(27, 30), [-5, 4, 0]);
  });

  it('rejects oscillation options that would not animate', () => {
    expect(() => createLineMeshDemo({ speed: -1 })).toThrow(SkinningSchemaError);
    expect(() => createLineMeshDemo({ speed: 0 })).toThrow(SkinningSchemaError);
  });

  it('ships a baked clip and a frame-filling projection', () => {
    const demo = createLineMeshDemo();
    expect(demo.clip.name).toBe('swing');
    expect(demo.clip.listBones()).toEqual([0, 1, 2]);
    expect(demo.projection[0]).toBeCloseTo(1 / 12, 10);
    expect(toSkinnedModel(demo).meshes).toEqual([demo.mesh]);
  });
});
