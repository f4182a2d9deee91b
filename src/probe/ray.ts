/**
 * Probe rays built from camera state.
 */

import { mat4, vec3, vec4 } from 'gl-matrix';
import type { CameraState } from '../compute/layout';
import type { Ray } from './rayTriangle';

export const DOWN: readonly [number, number, number] = [0, -1, 0];

function cameraPosition(camera: CameraState): vec3 {
  return vec3.fromValues(camera.viewPos[0], camera.viewPos[1], camera.viewPos[2]);
}

/** Straight down from the camera position. */
export function downwardRay(camera: CameraState): Ray {
  return { origin: cameraPosition(camera), direction: vec3.fromValues(DOWN[0], DOWN[1], DOWN[2]) };
}

/**
 * Ray from the camera through a cursor position in normalised device
 * coordinates (x, y in [-1, 1], y up). The cursor is unprojected onto the
 * far plane (depth 1, zero-to-one clip range) through the inverse
 * view-projection.
 */
export function pickRay(camera: CameraState, ndcX: number, ndcY: number): Ray {
  const inverse = mat4.invert(mat4.create(), camera.viewProj);
  if (!inverse) {
    throw new Error('View-projection matrix is not invertible');
  }

  const far = vec4.transformMat4(vec4.create(), vec4.fromValues(ndcX, ndcY, 1, 1), inverse);
  if (far[3] === 0) {
    throw new Error(`Cursor (${ndcX}, ${ndcY}) unprojects to infinity`);
  }

  const origin = cameraPosition(camera);
  const target = vec3.fromValues(far[0] / far[3], far[1] / far[3], far[2] / far[3]);
  const direction = vec3.normalize(vec3.create(), vec3.sub(vec3.create(), target, origin));

  return { origin, direction };
}
