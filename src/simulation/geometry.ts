export interface Vec3 {
  x: number;
  y: number; // up
  z: number;
}

/** A point on the ground plane (X/Z). */
export interface GroundPoint {
  x: number;
  z: number;
}

export interface Obstacle {
  id: string;
  min: GroundPoint; // inclusive
  max: GroundPoint; // inclusive
  height: number; // box spans y ∈ [0, height]
}

// Contact tolerance shared by every inclusive boundary test.
export const CONTACT_EPSILON = 1e-9;

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vec3, s: number): Vec3 {
  return { x: v.x * s, y: v.y * s, z: v.z * s };
}

export function length(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

export function distance(a: Vec3, b: Vec3): number {
  return length(sub(a, b));
}

/** Unit vector in the direction of `v`, or null for the zero vector. */
export function normalize(v: Vec3): Vec3 | null {
  const len = length(v);
  if (len < CONTACT_EPSILON) return null;
  return { x: v.x / len, y: v.y / len, z: v.z / len };
}

export function lerp(a: Vec3, b: Vec3, t: number): Vec3 {
  return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t, z: a.z + (b.z - a.z) * t };
}

/**
 * Evenly spaced points from `a` to `b`, both endpoints included.
 * Fewer than two samples still yields the two endpoints.
 */
export function sampleSegment(a: Vec3, b: Vec3, samples: number): Vec3[] {
  const count = Math.max(2, Math.floor(samples));
  const points: Vec3[] = [];
  for (let i = 0; i < count; i++) {
    points.push(lerp(a, b, i / (count - 1)));
  }
  return points;
}

export function obstacleCenter(obstacle: Obstacle): Vec3 {
  return {
    x: (obstacle.min.x + obstacle.max.x) / 2,
    y: obstacle.height / 2,
    z: (obstacle.min.z + obstacle.max.z) / 2,
  };
}

export function closestPointOnObstacle(p: Vec3, obstacle: Obstacle): Vec3 {
  return {
    x: clamp(p.x, obstacle.min.x, obstacle.max.x),
    y: clamp(p.y, 0, obstacle.height),
    z: clamp(p.z, obstacle.min.z, obstacle.max.z),
  };
}

/** Euclidean distance from `p` to the box; 0 anywhere inside or on it. */
export function distanceToObstacle(p: Vec3, obstacle: Obstacle): number {
  return distance(p, closestPointOnObstacle(p, obstacle));
}

export function pointInObstacle(p: Vec3, obstacle: Obstacle): boolean {
  return sphereIntersectsObstacle(p, 0, obstacle);
}

export function sphereIntersectsObstacle(center: Vec3, radius: number, obstacle: Obstacle): boolean {
  const closest = closestPointOnObstacle(center, obstacle);
  const d = sub(center, closest);
  const r = Math.max(0, radius);
  return d.x * d.x + d.y * d.y + d.z * d.z <= r * r + CONTACT_EPSILON;
}

export function collides(center: Vec3, radius: number, obstacles: readonly Obstacle[]): boolean {
  return obstacles.some((o) => sphereIntersectsObstacle(center, radius, o));
}

/** Ground-plane overlap area of `a` grown by `margin` on every side with `b`. */
export function footprintOverlapArea(a: Obstacle, b: Obstacle, margin = 0): number {
  const dx = Math.min(a.max.x + margin, b.max.x) - Math.max(a.min.x - margin, b.min.x);
  const dz = Math.min(a.max.z + margin, b.max.z) - Math.max(a.min.z - margin, b.min.z);
  if (dx < 0 || dz < 0) return 0;
  return dx * dz;
}

export function footprintsOverlap(a: Obstacle, b: Obstacle, margin = 0): boolean {
  return (
    a.min.x - margin <= b.max.x &&
    a.max.x + margin >= b.min.x &&
    a.min.z - margin <= b.max.z &&
    a.max.z + margin >= b.min.z
  );
}
