/**
 * Plane probe: a stand-in for a ground-plane query.
 *
 * This does no intersection math. Variant "constant" writes a fixed
 * placeholder; variant "camera-height" writes the camera's y, which equals
 * the distance straight down to y = 0 while the camera is above the plane.
 */

import { dispatchSingle, type Invocation } from '../compute/dispatch';
import { createResultBuffer, type CameraState } from '../compute/layout';

export const PLANE_PROBE_PLACEHOLDER = 1.0;

export type PlaneProbeVariant = 'constant' | 'camera-height';

export interface PlaneProbeBindings {
  camera: CameraState;
  result: Float32Array;
  variant: PlaneProbeVariant;
}

/** Dispatched as a single invocation. */
export function planeProbeKernel(_invocation: Invocation, bindings: PlaneProbeBindings): void {
  const { camera, result, variant } = bindings;
  result[0] = variant === 'camera-height' ? camera.viewPos[1] : PLANE_PROBE_PLACEHOLDER;
}

export function probePlane(camera: CameraState, variant: PlaneProbeVariant = 'camera-height'): number {
  const result = createResultBuffer();
  dispatchSingle(planeProbeKernel, { camera, result, variant });
  return result[0];
}
