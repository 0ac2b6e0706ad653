/**
 * 1€ filter (Casiez et al.): a low-pass filter whose cutoff rises with speed.
 * Slow movement is smoothed heavily to remove jitter, fast movement passes
 * through with little lag.
 *
 *   cutoff = minCutoff + beta * |smoothed velocity|
 *   alpha  = 1 / (1 + tau / dt), tau = 1 / (2 * PI * cutoff)
 */

import type { PointerMotionFilter, Vector2 } from "./types";
import { finiteOr, lerp, magnitude, subtract } from "./vector";

export interface OneEuroConfig {
	minCutoff: number; // Hz, smoothing at rest (default 1.0)
	beta: number; // speed coefficient (default 0.007)
	derivativeCutoff: number; // Hz, velocity smoothing (default 1.0)
}

export const ONE_EURO_DEFAULTS: OneEuroConfig = {
	minCutoff: 1.0,
	beta: 0.007,
	derivativeCutoff: 1.0,
};

const MIN_CUTOFF_HZ = 0.001;

/** Substituted for non-positive elapsed time between samples (seconds) */
const FALLBACK_DT = 0.001;

interface OneEuroState {
	value: Vector2;
	derivative: Vector2;
	timestamp: number;
}

export class OneEuroFilter implements PointerMotionFilter {
	readonly type = "oneEuro";

	private readonly config: OneEuroConfig;
	private state: OneEuroState | null = null;

	constructor(config: Partial<OneEuroConfig> = {}) {
		this.config = {
			minCutoff: Math.max(
				MIN_CUTOFF_HZ,
				finiteOr(config.minCutoff, ONE_EURO_DEFAULTS.minCutoff),
			),
			beta: Math.max(0, finiteOr(config.beta, ONE_EURO_DEFAULTS.beta)),
			derivativeCutoff: Math.max(
				MIN_CUTOFF_HZ,
				finiteOr(config.derivativeCutoff, ONE_EURO_DEFAULTS.derivativeCutoff),
			),
		};
	}

	filter(point: Vector2, timestamp: number): Vector2 {
		if (this.state === null) {
			this.state = {
				value: { x: point.x, y: point.y },
				derivative: { x: 0, y: 0 },
				timestamp,
			};
			return { x: point.x, y: point.y };
		}

		let dt = timestamp - this.state.timestamp;
		if (!(dt > 0)) dt = FALLBACK_DT;

		const rawDerivative = subtract(point, this.state.value);
		rawDerivative.x /= dt;
		rawDerivative.y /= dt;

		const derivative = lerp(
			this.state.derivative,
			rawDerivative,
			smoothingAlpha(this.config.derivativeCutoff, dt),
		);

		const cutoff = this.config.minCutoff + this.config.beta * magnitude(derivative);
		const value = lerp(this.state.value, point, smoothingAlpha(cutoff, dt));

		this.state = { value, derivative, timestamp };
		return { ...value };
	}

	reset(): void {
		this.state = null;
	}
}

/** Pure function: low-pass weight for a cutoff frequency and time step */
export function smoothingAlpha(cutoff: number, dt: number): number {
	const tau = 1 / (2 * Math.PI * cutoff);
	return 1 / (1 + tau / dt);
}
