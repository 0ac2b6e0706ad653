import { MOVEMENT_LIMIT } from "../constants/pointer";

/**
 * Round to the nearest integer, ties away from zero (2.5 -> 3, -2.5 -> -3).
 * Symmetric for both directions, unlike Math.round. Never returns -0.
 */
export function roundHalfAwayFromZero(value: number): number {
	const rounded = value < 0 ? -Math.round(-value) : Math.round(value);
	return rounded === 0 ? 0 : rounded;
}

/**
 * Clamp one axis of a relative movement report to [-127, 127].
 * Intended for movement sinks; the processor itself never clamps.
 */
export function clampMovement(value: number): number {
	return Math.max(-MOVEMENT_LIMIT, Math.min(MOVEMENT_LIMIT, value));
}
