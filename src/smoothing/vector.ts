import type { Vector2 } from "./types";

export const ZERO: Readonly<Vector2> = Object.freeze({ x: 0, y: 0 });

export function add(a: Vector2, b: Vector2): Vector2 {
	return { x: a.x + b.x, y: a.y + b.y };
}

export function subtract(a: Vector2, b: Vector2): Vector2 {
	return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vector2, factor: number): Vector2 {
	return { x: v.x * factor, y: v.y * factor };
}

/** a + (b - a) * t */
export function lerp(a: Vector2, b: Vector2, t: number): Vector2 {
	return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
}

export function sqrMagnitude(v: Vector2): number {
	return v.x * v.x + v.y * v.y;
}

export function magnitude(v: Vector2): number {
	return Math.sqrt(sqrMagnitude(v));
}

export function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

export function clamp01(value: number): number {
	return clamp(value, 0, 1);
}

/** Use `value` when it is a finite number, otherwise `fallback` */
export function finiteOr(value: number | undefined, fallback: number): number {
	return value !== undefined && Number.isFinite(value) ? value : fallback;
}
