// ── 2D point / vector helpers ──
// World coordinates: X right, Y down, unit = canvas pixels

export interface Vector2 {
  x: number;
  y: number;
}

export const ZERO: Vector2 = { x: 0, y: 0 };

export function vec(x: number, y: number): Vector2 {
  return { x, y };
}

export function add(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vector2, k: number): Vector2 {
  return { x: v.x * k, y: v.y * k };
}

export function divide(v: Vector2, k: number): Vector2 {
  return { x: v.x / k, y: v.y / k };
}

export function floor(v: Vector2): Vector2 {
  return { x: Math.floor(v.x), y: Math.floor(v.y) };
}

export function length(v: Vector2): number {
  return Math.sqrt(v.x ** 2 + v.y ** 2);
}

export function distance(a: Vector2, b: Vector2): number {
  return length(sub(a, b));
}

/**
 * Half-open rectangle test: `a` is inclusive, `b` is exclusive.
 * Every hit test in the editor goes through this, so right/bottom edges never hit.
 */
export function within(p: Vector2, a: Vector2, b: Vector2): boolean {
  return a.x <= p.x && p.x < b.x && a.y <= p.y && p.y < b.y;
}
