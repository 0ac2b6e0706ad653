/**
 * Pointer motion constants shared by the processor and movement sinks.
 */

/**
 * Relative mouse report range. Each axis of a report is a signed byte,
 * clamped to a symmetric range.
 */
export const MOVEMENT_LIMIT = 127;

/**
 * Default sensitivity and scaling applied to filtered deltas.
 */
export const SENSITIVITY_DEFAULTS = {
	/** Multiplier for horizontal motion */
	HORIZONTAL: 3.0,
	/** Multiplier for vertical motion */
	VERTICAL: 3.0,
	/** Multiplier applied to both axes after per-axis sensitivity */
	GLOBAL_SCALE: 1.0,
} as const;
