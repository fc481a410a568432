/**
 * Pose primitives shared by the navigation and mission layers
 */

export interface Point {
  x: number;
  y: number;
  z: number;
}

export interface Quaternion {
  x: number;
  y: number;
  z: number;
  w: number;
}

export interface Pose {
  position: Point;
  orientation: Quaternion;
}

export const IDENTITY_ORIENTATION: Readonly<Quaternion> = Object.freeze({ x: 0, y: 0, z: 0, w: 1 });

export const ORIGIN_POSE: Readonly<Pose> = Object.freeze({
  position: Object.freeze({ x: 0, y: 0, z: 0 }),
  orientation: IDENTITY_ORIENTATION,
});

export function createPose(x: number, y: number, z = 0, orientation: Quaternion = IDENTITY_ORIENTATION): Pose {
  return {
    position: { x, y, z },
    orientation: { ...orientation },
  };
}

/**
 * Euclidean distance on the ground plane (z is ignored)
 */
export function planarDistance(a: Pose, b: Pose): number {
  const dx = a.position.x - b.position.x;
  const dy = a.position.y - b.position.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Fraction of the route already covered, given the remaining distance and the
 * distance measured when the goal was submitted.
 */
export function progressFraction(remaining: number, initialDistance: number): number {
  if (!(initialDistance > 0)) {
    return 1;
  }
  const fraction = 1 - remaining / initialDistance;
  if (Number.isNaN(fraction)) {
    return 0;
  }
  return clamp(fraction, 0, 1);
}

export function formatPose(pose: Pose): string {
  const { x, y, z } = pose.position;
  return `(${x.toFixed(2)}, ${y.toFixed(2)}, ${z.toFixed(2)})`;
}
