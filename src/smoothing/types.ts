/**
 * Pointer motion filter types.
 * Filters take absolute pointer positions and return a smoothed position
 * in the same coordinate space.
 */

/** 2D point or vector (screen pixels, touchpad units, etc.) */
export interface Vector2 {
	x: number;
	y: number;
}

/** Available filter algorithms */
export type FilterType =
	| "none"
	| "mute"
	| "ema"
	| "doubleExponential"
	| "kalman"
	| "predictive"
	| "oneEuro";

/** Filter interface - strategy pattern for different algorithms */
export interface PointerMotionFilter {
	readonly type: FilterType;

	/**
	 * Feed one sample, returns the filtered position.
	 * @param timestamp - seconds
	 */
	filter(point: Vector2, timestamp: number): Vector2;

	/** Discard all history; the next sample re-seeds the filter */
	reset(): void;
}

/** Loose parameter bag used by the factory and persisted settings */
export type FilterParams = Partial<Record<string, number>>;

/** UI metadata for a single filter parameter */
export interface FilterParameterInfo {
	key: string;
	label: string;
	min: number;
	max: number;
	defaultValue: number;
}
