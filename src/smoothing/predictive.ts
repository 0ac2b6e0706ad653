/**
 * Predictive filter: extrapolates the pointer ahead of the newest sample to
 * offset perceived transport latency.
 *
 * Velocity comes from the oldest and newest of the last HISTORY_SIZE samples,
 * smoothed with an EMA:
 *   velocity = lerp(velocity, (newest - oldest) / dt, velocitySmoothing)
 *   output   = newest + velocity * predictionTime
 */

import type { PointerMotionFilter, Vector2 } from "./types";
import { add, clamp01, finiteOr, lerp, scale, subtract } from "./vector";

export interface PredictiveConfig {
	predictionTime: number; // seconds ahead, >= 0 (default 0.05)
	velocitySmoothing: number; // 0-1, higher = follows raw velocity faster (default 0.5)
}

export const PREDICTIVE_DEFAULTS: PredictiveConfig = {
	predictionTime: 0.05,
	velocitySmoothing: 0.5,
};

export const PREDICTIVE_HISTORY_SIZE = 5;

/** Time spans shorter than this (seconds) produce a zero velocity estimate */
export const MIN_VELOCITY_DT = 1e-6;

export interface TimedSample {
	position: Vector2;
	timestamp: number;
}

export class PredictiveFilter implements PointerMotionFilter {
	readonly type = "predictive";

	private readonly config: PredictiveConfig;
	private readonly history: TimedSample[] = [];
	private head = 0; // next slot to overwrite once the ring is full
	private velocity: Vector2 = { x: 0, y: 0 };

	constructor(config: Partial<PredictiveConfig> = {}) {
		this.config = {
			predictionTime: Math.max(
				0,
				finiteOr(config.predictionTime, PREDICTIVE_DEFAULTS.predictionTime),
			),
			velocitySmoothing: clamp01(
				finiteOr(config.velocitySmoothing, PREDICTIVE_DEFAULTS.velocitySmoothing),
			),
		};
	}

	filter(point: Vector2, timestamp: number): Vector2 {
		this.push({ position: { x: point.x, y: point.y }, timestamp });

		const raw = estimateVelocity(this.oldest(), this.newest());
		this.velocity = lerp(this.velocity, raw, this.config.velocitySmoothing);

		return add(point, scale(this.velocity, this.config.predictionTime));
	}

	reset(): void {
		this.history.length = 0;
		this.head = 0;
		this.velocity = { x: 0, y: 0 };
	}

	getVelocity(): Vector2 {
		return { ...this.velocity };
	}

	private push(sample: TimedSample): void {
		if (this.history.length < PREDICTIVE_HISTORY_SIZE) {
			this.history.push(sample);
			return;
		}
		this.history[this.head] = sample;
		this.head = (this.head + 1) % PREDICTIVE_HISTORY_SIZE;
	}

	private oldest(): TimedSample {
		return this.history[this.history.length < PREDICTIVE_HISTORY_SIZE ? 0 : this.head];
	}

	private newest(): TimedSample {
		const index =
			this.history.length < PREDICTIVE_HISTORY_SIZE
				? this.history.length - 1
				: (this.head + PREDICTIVE_HISTORY_SIZE - 1) % PREDICTIVE_HISTORY_SIZE;
		return this.history[index];
	}
}

/** Velocity between two samples, zero when they are too close in time */
export function estimateVelocity(oldest: TimedSample, newest: TimedSample): Vector2 {
	const dt = newest.timestamp - oldest.timestamp;
	if (!(dt >= MIN_VELOCITY_DT)) {
		return { x: 0, y: 0 };
	}
	const displacement = subtract(newest.position, oldest.position);
	return { x: displacement.x / dt, y: displacement.y / dt };
}
