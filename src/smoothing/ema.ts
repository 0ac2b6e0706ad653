/**
 * EMA (Exponential Moving Average) filter with a dead-band.
 *
 * Formula: filtered = alpha * point + (1 - alpha) * last
 * The result is only committed when it moves at least `minChange` away
 * from the last committed value; smaller changes return the previous value.
 */

import type { PointerMotionFilter, Vector2 } from "./types";
import { clamp01, finiteOr, sqrMagnitude, subtract } from "./vector";

export interface EmaConfig {
	alpha: number; // 0-1, higher = less smoothing (default 0.5)
	minChange: number; // dead-band radius (default 0.0001)
}

export const EMA_DEFAULTS: EmaConfig = {
	alpha: 0.5,
	minChange: 0.0001,
};

export class EmaFilter implements PointerMotionFilter {
	readonly type = "ema";

	private config: EmaConfig;
	private lastValue: Vector2 | null = null;

	constructor(config: Partial<EmaConfig> = {}) {
		this.config = {
			alpha: clamp01(finiteOr(config.alpha, EMA_DEFAULTS.alpha)),
			minChange: Math.max(0, finiteOr(config.minChange, EMA_DEFAULTS.minChange)),
		};
	}

	filter(point: Vector2, _timestamp: number): Vector2 {
		if (this.lastValue === null) {
			this.lastValue = { x: point.x, y: point.y };
			return { ...this.lastValue };
		}

		const filtered = emaStep(this.lastValue, point, this.config.alpha);
		const { minChange } = this.config;
		if (sqrMagnitude(subtract(filtered, this.lastValue)) >= minChange * minChange) {
			this.lastValue = filtered;
		}

		return { ...this.lastValue };
	}

	reset(): void {
		this.lastValue = null;
	}

	getConfig(): EmaConfig {
		return { ...this.config };
	}
}

/** Pure function version for testing */
export function emaStep(last: Vector2, point: Vector2, alpha: number): Vector2 {
	return {
		x: alpha * point.x + (1 - alpha) * last.x,
		y: alpha * point.y + (1 - alpha) * last.y,
	};
}
