/**
 * Double exponential smoothing (Holt's linear method).
 *
 *   level = alpha * point + (1 - alpha) * (prevLevel + trend)
 *   trend = beta * (level - prevLevel) + (1 - beta) * trend
 *
 * Output is the level. The trend only speeds up convergence while the
 * pointer keeps moving; it is never added to the output.
 */

import type { PointerMotionFilter, Vector2 } from "./types";
import { clamp01, finiteOr } from "./vector";

export interface HoltConfig {
	alpha: number; // level smoothing 0-1 (default 0.5)
	beta: number; // trend smoothing 0-1 (default 0.1)
}

export const HOLT_DEFAULTS: HoltConfig = {
	alpha: 0.5,
	beta: 0.1,
};

interface HoltState {
	level: Vector2;
	trend: Vector2;
}

export class DoubleExponentialFilter implements PointerMotionFilter {
	readonly type = "doubleExponential";

	private config: HoltConfig;
	private state: HoltState | null = null;

	constructor(config: Partial<HoltConfig> = {}) {
		this.config = {
			alpha: clamp01(finiteOr(config.alpha, HOLT_DEFAULTS.alpha)),
			beta: clamp01(finiteOr(config.beta, HOLT_DEFAULTS.beta)),
		};
	}

	filter(point: Vector2, _timestamp: number): Vector2 {
		if (this.state === null) {
			this.state = { level: { x: point.x, y: point.y }, trend: { x: 0, y: 0 } };
			return { x: point.x, y: point.y };
		}

		const { alpha, beta } = this.config;
		const x = holtStep(this.state.level.x, this.state.trend.x, point.x, alpha, beta);
		const y = holtStep(this.state.level.y, this.state.trend.y, point.y, alpha, beta);
		this.state = {
			level: { x: x.level, y: y.level },
			trend: { x: x.trend, y: y.trend },
		};

		return { ...this.state.level };
	}

	reset(): void {
		this.state = null;
	}

	/** Current trend (units per sample), zero before the first sample */
	getTrend(): Vector2 {
		return this.state ? { ...this.state.trend } : { x: 0, y: 0 };
	}
}

/** Pure function for a single axis step (for testing) */
export function holtStep(
	prevLevel: number,
	prevTrend: number,
	observation: number,
	alpha: number,
	beta: number,
): { level: number; trend: number } {
	const level = alpha * observation + (1 - alpha) * (prevLevel + prevTrend);
	const trend = beta * (level - prevLevel) + (1 - beta) * prevTrend;
	return { level, trend };
}
