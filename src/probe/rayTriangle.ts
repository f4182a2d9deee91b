/**
 * Ray–triangle intersection (Möller–Trumbore).
 *
 * Returns the distance t along `ray.direction` to the hit point, or NO_HIT
 * (-1) when the ray misses or runs parallel to the triangle's plane. A
 * returned t can be negative: the plane was crossed behind the origin.
 * Callers keep only t > 0.
 */

import { vec3, type ReadonlyVec3 } from 'gl-matrix';
import { NO_HIT } from '../compute/layout';

export const PARALLEL_EPSILON = 1e-5;

export interface Ray {
  origin: ReadonlyVec3;
  direction: ReadonlyVec3;
}

export function intersectRayTriangle(
  ray: Ray,
  v0: ReadonlyVec3,
  v1: ReadonlyVec3,
  v2: ReadonlyVec3,
): number {
  const e1 = vec3.sub(vec3.create(), v1, v0);
  const e2 = vec3.sub(vec3.create(), v2, v0);
  const h = vec3.cross(vec3.create(), ray.direction, e2);
  const a = vec3.dot(e1, h);

  if (Math.abs(a) < PARALLEL_EPSILON) return NO_HIT;

  const f = 1.0 / a;
  const s = vec3.sub(vec3.create(), ray.origin, v0);
  const u = f * vec3.dot(s, h);
  if (u < 0.0 || u > 1.0) return NO_HIT;

  const q = vec3.cross(vec3.create(), s, e1);
  const v = f * vec3.dot(ray.direction, q);
  if (v < 0.0 || u + v > 1.0) return NO_HIT;

  return f * vec3.dot(e2, q);
}
