import type { MovementDelta } from "../processing/PointerInputProcessor";

/**
 * Format a movement delta as "(dx, dy)" for log lines.
 */
export function formatDelta(delta: MovementDelta): string {
	return `(${delta.dx}, ${delta.dy})`;
}

