/**
 * 2-D vector primitives used by the stretch computation.
 * Moves are stretched in the XY plane only, so Z never appears here.
 */

/** A position or a displacement in the XY plane (mm) */
export interface Point {
  x: number;
  y: number;
}

export function add(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtract(a: Point, b: Point): Point {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Point, factor: number): Point {
  return { x: v.x * factor, y: v.y * factor };
}

export function magnitude(v: Point): number {
  return Math.hypot(v.x, v.y);
}

export function distance(a: Point, b: Point): number {
  return magnitude(subtract(b, a));
}

/**
 * Same direction, unit length. Anything shorter than 1e-10 has no usable
 * direction and becomes the zero vector.
 */
export function normalize(v: Point): Point {
  const length = magnitude(v);
  return length < 1e-10 ? { x: 0, y: 0 } : scale(v, 1 / length);
}

/**
 * Quarter turn clockwise: (x, y) -> (y, -x)
 */
export function perpendicular(v: Point): Point {
  return { x: v.y, y: -v.x };
}

/**
 * Component of `v` along the unit vector `axis`
 */
export function project(v: Point, axis: Point): Point {
  return scale(axis, axis.x * v.x + axis.y * v.y);
}

/**
 * Point at fraction `t` of the way from `from` to `to`
 */
export function lerp(from: Point, to: Point, t: number): Point {
  return add(from, scale(subtract(to, from), t));
}
