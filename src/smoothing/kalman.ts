/**
 * Kalman filter for pointer positions.
 *
 * Each axis runs an independent 2-state filter: [position, velocity] with a
 * constant-velocity model. Both axes share the same noise parameters, so the
 * filter behaves identically horizontally and vertically.
 *
 * Key parameters:
 * - q (process noise): how much the pointer can change unexpectedly
 * - r (measurement noise): how noisy the incoming positions are
 * - Higher q = trust measurements more, respond faster
 * - Higher r = trust predictions more, smoother output with more lag
 *
 * The model steps by a fixed nominal dt rather than elapsed time, so irregular
 * sample cadence does not change the amount of smoothing.
 */

import type { PointerMotionFilter, Vector2 } from "./types";
import { finiteOr } from "./vector";

export interface KalmanConfig {
	processNoise: number; // q, >= 0.0001 (default 0.001)
	measurementNoise: number; // r, >= 0.01 (default 0.1)
}

export const KALMAN_DEFAULTS: KalmanConfig = {
	processNoise: 0.001,
	measurementNoise: 0.1,
};

export const KALMAN_MIN_PROCESS_NOISE = 0.0001;
export const KALMAN_MIN_MEASUREMENT_NOISE = 0.01;

/** Nominal time step of the motion model (seconds) */
export const KALMAN_DT = 0.01;

/** Innovation variance below this is treated as singular */
const SINGULAR_EPSILON = 1e-9;

/**
 * 1D Kalman filter for a single axis (position + velocity).
 */
export class Kalman1D {
	// State: [position, velocity]
	private x: number;
	private v: number;

	// Covariance matrix (2x2, stored as 4 elements)
	private p00 = 1;
	private p01 = 0;
	private p10 = 0;
	private p11 = 1;

	private readonly q: number;
	private readonly r: number;

	constructor(q: number, r: number, initialPos = 0) {
		this.q = q;
		this.r = r;
		this.x = initialPos;
		this.v = 0;
	}

	/** Predict + Update step, returns new position estimate */
	update(measurement: number): number {
		const dt = KALMAN_DT;

		// === PREDICT ===
		const xPred = this.x + this.v * dt;
		const vPred = this.v;

		// P' = F * P * F' + q * I, F = [[1, dt], [0, 1]]
		const p00Pred =
			this.p00 + dt * (this.p10 + this.p01) + dt * dt * this.p11 + this.q;
		const p01Pred = this.p01 + dt * this.p11;
		const p10Pred = this.p10 + dt * this.p11;
		const p11Pred = this.p11 + this.q;

		// === UPDATE ===
		// H = [1, 0]: only position is measured
		const s = p00Pred + this.r;
		if (!Number.isFinite(s) || Math.abs(s) < SINGULAR_EPSILON) {
			this.x = xPred;
			this.v = vPred;
			this.resetCovariance();
			return this.x;
		}

		const k0 = p00Pred / s;
		const k1 = p10Pred / s;

		const innovation = measurement - xPred;
		this.x = xPred + k0 * innovation;
		this.v = vPred + k1 * innovation;

		// P = (I - K * H) * P'
		this.p00 = (1 - k0) * p00Pred;
		this.p01 = (1 - k0) * p01Pred;
		this.p10 = p10Pred - k1 * p00Pred;
		this.p11 = p11Pred - k1 * p01Pred;

		if (
			!Number.isFinite(this.p00) ||
			!Number.isFinite(this.p01) ||
			!Number.isFinite(this.p10) ||
			!Number.isFinite(this.p11)
		) {
			this.resetCovariance();
		}

		return this.x;
	}

	getPosition(): number {
		return this.x;
	}

	getVelocity(): number {
		return this.v;
	}

	getCovariance(): [number, number, number, number] {
		return [this.p00, this.p01, this.p10, this.p11];
	}

	reset(initialPos = 0): void {
		this.x = initialPos;
		this.v = 0;
		this.resetCovariance();
	}

	private resetCovariance(): void {
		this.p00 = 1;
		this.p01 = 0;
		this.p10 = 0;
		this.p11 = 1;
	}
}

export class KalmanFilter implements PointerMotionFilter {
	readonly type = "kalman";

	private readonly config: KalmanConfig;
	private readonly filterX: Kalman1D;
	private readonly filterY: Kalman1D;
	private initialized = false;

	constructor(config: Partial<KalmanConfig> = {}) {
		this.config = {
			processNoise: Math.max(
				KALMAN_MIN_PROCESS_NOISE,
				finiteOr(config.processNoise, KALMAN_DEFAULTS.processNoise),
			),
			measurementNoise: Math.max(
				KALMAN_MIN_MEASUREMENT_NOISE,
				finiteOr(config.measurementNoise, KALMAN_DEFAULTS.measurementNoise),
			),
		};
		const { processNoise, measurementNoise } = this.config;
		this.filterX = new Kalman1D(processNoise, measurementNoise);
		this.filterY = new Kalman1D(processNoise, measurementNoise);
	}

	filter(point: Vector2, _timestamp: number): Vector2 {
		if (!this.initialized) {
			this.filterX.reset(point.x);
			this.filterY.reset(point.y);
			this.initialized = true;
			return { x: point.x, y: point.y };
		}

		return {
			x: this.filterX.update(point.x),
			y: this.filterY.update(point.y),
		};
	}

	reset(): void {
		this.initialized = false;
		this.filterX.reset();
		this.filterY.reset();
	}

	getConfig(): KalmanConfig {
		return { ...this.config };
	}

	/** Get current velocities (useful for debugging/visualization) */
	getVelocities(): { vx: number; vy: number } {
		return {
			vx: this.filterX.getVelocity(),
			vy: this.filterY.getVelocity(),
		};
	}
}

/** Pure function for single Kalman prediction step (for testing) */
export function kalmanPredict(
	x: number,
	v: number,
	dt = KALMAN_DT,
): { xPred: number; vPred: number } {
	return { xPred: x + v * dt, vPred: v };
}
