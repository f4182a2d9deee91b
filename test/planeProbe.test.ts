import { mat4 } from 'gl-matrix';
import { PLANE_PROBE_PLACEHOLDER, planeProbeKernel, probePlane } from '../src/probe/planeProbe';
import type { CameraState } from '../src/compute/layout';

const camera: CameraState = { viewPos: [1, 7.5, 3, 1], viewProj: mat4.create() };

describe('probePlane', () => {
  it('should write the camera height by default', () => {
    expect(probePlane(camera)).toBe(7.5);
  });

  it('should write the placeholder in the constant variant', () => {
    expect(probePlane(camera, 'constant')).toBe(PLANE_PROBE_PLACEHOLDER);
    expect(PLANE_PROBE_PLACEHOLDER).toBe(1.0);
  });

  it('should round the camera height to f32', () => {
    const highCamera: CameraState = { viewPos: [0, 0.1, 0, 1], viewProj: mat4.create() };
    expect(probePlane(highCamera)).toBe(Math.fround(0.1));
  });
});

describe('planeProbeKernel', () => {
  it('should only touch result slot 0', () => {
    const result = new Float32Array([9, 9, 9]);

    planeProbeKernel({ globalId: 0, workgroupId: 0, localId: 0 }, { camera, result, variant: 'camera-height' });

    expect(Array.from(result)).toEqual([7.5, 9, 9]);
  });
});
