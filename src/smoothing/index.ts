/**
 * Pointer motion filters.
 * Provides a factory to create filters by type, plus UI metadata for each.
 */

export {
	DoubleExponentialFilter,
	HOLT_DEFAULTS,
	holtStep,
} from "./holt";
export type { HoltConfig } from "./holt";
export { EMA_DEFAULTS, EmaFilter, emaStep } from "./ema";
export type { EmaConfig } from "./ema";
export {
	KALMAN_DEFAULTS,
	KALMAN_DT,
	Kalman1D,
	KalmanFilter,
	kalmanPredict,
} from "./kalman";
export type { KalmanConfig } from "./kalman";
export { ONE_EURO_DEFAULTS, OneEuroFilter, smoothingAlpha } from "./oneEuro";
export type { OneEuroConfig } from "./oneEuro";
export { IdentityFilter, MuteFilter } from "./passthrough";
export {
	PREDICTIVE_DEFAULTS,
	PREDICTIVE_HISTORY_SIZE,
	PredictiveFilter,
	estimateVelocity,
} from "./predictive";
export type { PredictiveConfig, TimedSample } from "./predictive";
export type {
	FilterParameterInfo,
	FilterParams,
	FilterType,
	PointerMotionFilter,
	Vector2,
} from "./types";

import { DoubleExponentialFilter, HOLT_DEFAULTS } from "./holt";
import { EMA_DEFAULTS, EmaFilter } from "./ema";
import { KALMAN_DEFAULTS, KalmanFilter } from "./kalman";
import { ONE_EURO_DEFAULTS, OneEuroFilter } from "./oneEuro";
import { IdentityFilter, MuteFilter } from "./passthrough";
import { PREDICTIVE_DEFAULTS, PredictiveFilter } from "./predictive";
import type {
	FilterParameterInfo,
	FilterParams,
	FilterType,
	PointerMotionFilter,
} from "./types";

/** All filter types, in display order */
export const FILTER_TYPES: readonly FilterType[] = [
	"none",
	"oneEuro",
	"ema",
	"kalman",
	"doubleExponential",
	"predictive",
	"mute",
];

export function isFilterType(value: unknown): value is FilterType {
	return typeof value === "string" && FILTER_TYPES.some((type) => type === value);
}

/**
 * Create a filter instance for the given type.
 * Missing or non-finite params fall back to the filter's defaults.
 */
export function createFilter(
	type: FilterType,
	params: FilterParams = {},
): PointerMotionFilter {
	switch (type) {
		case "none":
			return new IdentityFilter();
		case "mute":
			return new MuteFilter();
		case "ema":
			return new EmaFilter({ alpha: params.alpha, minChange: params.minChange });
		case "doubleExponential":
			return new DoubleExponentialFilter({ alpha: params.alpha, beta: params.beta });
		case "kalman":
			return new KalmanFilter({
				processNoise: params.processNoise,
				measurementNoise: params.measurementNoise,
			});
		case "predictive":
			return new PredictiveFilter({
				predictionTime: params.predictionTime,
				velocitySmoothing: params.velocitySmoothing,
			});
		case "oneEuro":
			return new OneEuroFilter({
				minCutoff: params.minCutoff,
				beta: params.beta,
				derivativeCutoff: params.derivativeCutoff,
			});
		default: {
			// Exhaustive check
			const _exhaustive: never = type;
			throw new Error(`Unknown filter type: ${_exhaustive}`);
		}
	}
}

/** Human-readable labels for filter types (for UI) */
export const FILTER_LABELS: Record<FilterType, string> = {
	none: "No Filter",
	mute: "Mute",
	ema: "EMA Filter",
	doubleExponential: "Double Exp",
	kalman: "Kalman Filter",
	predictive: "Predictive",
	oneEuro: "1€ Filter",
};

/** Descriptions for filter types (for UI tooltips) */
export const FILTER_DESCRIPTIONS: Record<FilterType, string> = {
	none: "Raw pointer input, no smoothing",
	mute: "Swallows all motion while keeping the pointer wired",
	ema: "Simple exponential moving average with a jitter dead-band",
	doubleExponential: "Double exponential smoothing (Holt's method)",
	kalman: "Statistical filter that models uncertainty for optimal smoothing",
	predictive: "Reduces perceived latency by predicting future position",
	oneEuro: "Adaptive filter that adjusts smoothing based on movement speed",
};

/** Tunable parameters per filter type, with slider ranges and defaults */
export const FILTER_PARAMETERS: Record<FilterType, FilterParameterInfo[]> = {
	none: [],
	mute: [],
	ema: [
		{ key: "alpha", label: "Smoothing", min: 0.05, max: 1, defaultValue: EMA_DEFAULTS.alpha },
		{
			key: "minChange",
			label: "Min Change",
			min: 0.0001,
			max: 0.01,
			defaultValue: EMA_DEFAULTS.minChange,
		},
	],
	doubleExponential: [
		{
			key: "alpha",
			label: "Level Smoothing",
			min: 0.1,
			max: 0.9,
			defaultValue: HOLT_DEFAULTS.alpha,
		},
		{
			key: "beta",
			label: "Trend Smoothing",
			min: 0.01,
			max: 0.5,
			defaultValue: HOLT_DEFAULTS.beta,
		},
	],
	kalman: [
		{
			key: "processNoise",
			label: "Process Noise",
			min: 0.0001,
			max: 0.01,
			defaultValue: KALMAN_DEFAULTS.processNoise,
		},
		{
			key: "measurementNoise",
			label: "Measurement Noise",
			min: 0.01,
			max: 1,
			defaultValue: KALMAN_DEFAULTS.measurementNoise,
		},
	],
	predictive: [
		{
			key: "predictionTime",
			label: "Prediction Time",
			min: 0.01,
			max: 0.2,
			defaultValue: PREDICTIVE_DEFAULTS.predictionTime,
		},
		{
			key: "velocitySmoothing",
			label: "Smoothing",
			min: 0.1,
			max: 0.9,
			defaultValue: PREDICTIVE_DEFAULTS.velocitySmoothing,
		},
	],
	oneEuro: [
		{
			key: "minCutoff",
			label: "Smoothing",
			min: 0.1,
			max: 5,
			defaultValue: ONE_EURO_DEFAULTS.minCutoff,
		},
		{
			key: "beta",
			label: "Response",
			min: 0.001,
			max: 0.1,
			defaultValue: ONE_EURO_DEFAULTS.beta,
		},
	],
};
