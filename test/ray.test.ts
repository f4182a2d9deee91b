import { mat4, vec3 } from 'gl-matrix';
import { downwardRay, pickRay } from '../src/probe/ray';
import type { CameraState } from '../src/compute/layout';

function lookingDownCamera(): CameraState {
  const eye = vec3.fromValues(0, 10, 0);
  const view = mat4.lookAt(mat4.create(), eye, [0, 0, 0], [0, 0, -1]);
  const proj = mat4.perspectiveZO(mat4.create(), Math.PI / 3, 16 / 9, 0.1, 100);
  return {
    viewPos: [eye[0], eye[1], eye[2], 1],
    viewProj: mat4.multiply(mat4.create(), proj, view),
  };
}

describe('downwardRay', () => {
  it('should start at the camera and point straight down', () => {
    const ray = downwardRay({ viewPos: [3, 12, -4, 1], viewProj: mat4.create() });

    expect(Array.from(ray.origin)).toEqual([3, 12, -4]);
    expect(Array.from(ray.direction)).toEqual([0, -1, 0]);
  });
});

describe('pickRay', () => {
  it('should point straight down through the centre of a looking-down camera', () => {
    const ray = pickRay(lookingDownCamera(), 0, 0);

    expect(Array.from(ray.origin)).toEqual([0, 10, 0]);
    expect(ray.direction[0]).toBeCloseTo(0, 4);
    expect(ray.direction[1]).toBeCloseTo(-1, 4);
    expect(ray.direction[2]).toBeCloseTo(0, 4);
  });

  it('should return unit directions that lean towards the cursor', () => {
    const centre = pickRay(lookingDownCamera(), 0, 0);
    const corner = pickRay(lookingDownCamera(), 0.8, -0.6);

    expect(vec3.length(corner.direction)).toBeCloseTo(1, 5);
    expect(corner.direction[1]).toBeLessThan(0);
    expect(vec3.dot(corner.direction, centre.direction)).toBeLessThan(0.999);
  });

  it('should throw for a singular view-projection matrix', () => {
    const camera: CameraState = { viewPos: [0, 10, 0, 1], viewProj: new Float32Array(16) };
    expect(() => pickRay(camera, 0, 0)).toThrow('View-projection matrix is not invertible');
  });
});
