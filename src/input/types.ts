// Screen-space geometry. Floating point lives here and in the layout
// mapping only; the board itself is integer-indexed.

export type Point = Readonly<{ x: number; y: number }>;

// A displacement, kept distinct from Point at the type level by name only
export type Vector = Readonly<{ dx: number; dy: number }>;

export const ZERO_VECTOR: Vector = { dx: 0, dy: 0 };

export function subtractPoints(a: Point, b: Point): Vector {
  return { dx: a.x - b.x, dy: a.y - b.y };
}

export function subtractVector(p: Point, v: Vector): Point {
  return { x: p.x - v.dx, y: p.y - v.dy };
}

export function scaleVector(v: Vector, factor: number): Vector {
  return { dx: v.dx * factor, dy: v.dy * factor };
}
