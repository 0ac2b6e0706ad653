/**
 * Stateless filters: Identity passes every sample through, Mute swallows
 * all motion while keeping the pipeline wired.
 */

import type { PointerMotionFilter, Vector2 } from "./types";

export class IdentityFilter implements PointerMotionFilter {
	readonly type = "none";

	filter(point: Vector2, _timestamp: number): Vector2 {
		return { x: point.x, y: point.y };
	}

	reset(): void {}
}

export class MuteFilter implements PointerMotionFilter {
	readonly type = "mute";

	filter(_point: Vector2, _timestamp: number): Vector2 {
		return { x: 0, y: 0 };
	}

	reset(): void {}
}
