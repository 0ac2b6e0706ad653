import { SENSITIVITY_DEFAULTS } from "../constants/pointer";
import { TimerService } from "../services/TimerService";
import { FILTER_LABELS } from "../smoothing";
import { IdentityFilter } from "../smoothing/passthrough";
import type { PointerMotionFilter, Vector2 } from "../smoothing/types";
import { formatDelta } from "../utils/formatters";
import { roundHalfAwayFromZero } from "../utils/quantize";

// ===== Types =====

/** Quantized relative motion, never (0, 0) */
export interface MovementDelta {
	dx: number;
	dy: number;
}

/**
 * Receives one relative-motion report per processed sample.
 * Returns whether the downstream transport accepted the report.
 * The sink owns range checking (see clampMovement).
 */
export type MovementSink = (dx: number, dy: number) => boolean;

export interface SensitivitySettings {
	horizontalSensitivity: number;
	verticalSensitivity: number;
	globalScale: number;
	/** Negate vertical motion (screen Y grows down, mouse Y grows up) */
	invertY: boolean;
}

export interface PointerInputOptions extends SensitivitySettings {
	filter: PointerMotionFilter;
	/** Time provider in seconds (for testing) */
	now: () => number;
}

export interface PointerInputStats {
	emitted: number;
	suppressed: number;
	rejected: number;
}

// ===== Processor =====

/**
 * Turns absolute pointer positions into quantized relative motion.
 * Synchronous and single-writer: the sink is called inline, once per
 * sample that produced a non-zero delta.
 */
export class PointerInputProcessor {
	private filter: PointerMotionFilter;
	private settings: SensitivitySettings;
	private lastFilteredPosition: Vector2 | null = null;
	private stats: PointerInputStats = { emitted: 0, suppressed: 0, rejected: 0 };
	private readonly sink: MovementSink;
	private readonly now: () => number;

	constructor(sink: MovementSink, options: Partial<PointerInputOptions> = {}) {
		this.sink = sink;
		this.filter = options.filter ?? new IdentityFilter();
		this.now = options.now ?? TimerService.now;
		this.settings = {
			horizontalSensitivity:
				options.horizontalSensitivity ?? SENSITIVITY_DEFAULTS.HORIZONTAL,
			verticalSensitivity: options.verticalSensitivity ?? SENSITIVITY_DEFAULTS.VERTICAL,
			globalScale: options.globalScale ?? SENSITIVITY_DEFAULTS.GLOBAL_SCALE,
			invertY: options.invertY ?? false,
		};
	}

	// ===== Configuration =====

	getFilter(): PointerMotionFilter {
		return this.filter;
	}

	/**
	 * Swap the active filter. Does not reset; call reset() when the new
	 * filter should start from a clean baseline.
	 */
	setFilter(filter: PointerMotionFilter): void {
		if (filter === this.filter) return;
		this.filter = filter;
		console.log(`[PointerInput] Changed input filter to: ${FILTER_LABELS[filter.type]}`);
	}

	getSettings(): SensitivitySettings {
		return { ...this.settings };
	}

	/** Update sensitivity at runtime; filter state is kept */
	setSensitivity(settings: Partial<SensitivitySettings>): void {
		this.settings = { ...this.settings, ...settings };
	}

	getStats(): PointerInputStats {
		return { ...this.stats };
	}

	getLastFilteredPosition(): Vector2 | null {
		return this.lastFilteredPosition ? { ...this.lastFilteredPosition } : null;
	}

	// ===== Input Methods =====

	/**
	 * Clear the baseline and filter history. Call when a drag ends or the
	 * input source changes so stale velocity does not leak into new motion.
	 */
	reset(): void {
		this.lastFilteredPosition = null;
		this.filter.reset();
	}

	/**
	 * Feed one absolute position.
	 * @param timestamp - seconds; omitted or 0 means "now"
	 * @returns the delta sent to the sink, or null when nothing was sent
	 */
	updatePosition(position: Vector2, timestamp?: number): MovementDelta | null {
		const time = timestamp ? timestamp : this.now();
		const filtered = this.filter.filter(position, time);
		if (!Number.isFinite(filtered.x) || !Number.isFinite(filtered.y)) {
			this.stats.suppressed++;
			return null;
		}

		// First sample after reset only establishes the baseline
		const baseline = this.lastFilteredPosition ?? filtered;
		this.lastFilteredPosition = filtered;

		const delta = quantizeDelta(
			{ x: filtered.x - baseline.x, y: filtered.y - baseline.y },
			this.settings,
		);
		if (delta.dx === 0 && delta.dy === 0) {
			this.stats.suppressed++;
			return null;
		}

		this.stats.emitted++;
		if (!this.sink(delta.dx, delta.dy)) {
			this.stats.rejected++;
			console.warn(`[PointerInput] Movement report rejected: ${formatDelta(delta)}`);
		}
		return delta;
	}
}

/**
 * Pure function: scale a filtered delta and round it to integer counts.
 * Per-axis sensitivity first, then global scale, then optional Y inversion.
 */
export function quantizeDelta(
	delta: Vector2,
	settings: SensitivitySettings,
): MovementDelta {
	const x = delta.x * settings.horizontalSensitivity * settings.globalScale;
	let y = delta.y * settings.verticalSensitivity * settings.globalScale;
	if (settings.invertY) y = -y;

	return {
		dx: roundHalfAwayFromZero(x),
		dy: roundHalfAwayFromZero(y),
	};
}
