import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { EmaFilter } from "../smoothing/ema";
import { IdentityFilter, MuteFilter } from "../smoothing/passthrough";
import type { PointerMotionFilter } from "../smoothing/types";
import {
	type MovementSink,
	PointerInputProcessor,
	quantizeDelta,
} from "./PointerInputProcessor";

function createSpyFilter() {
	return {
		type: "none" as const,
		filter: vi.fn<PointerMotionFilter["filter"]>((point) => ({ x: point.x, y: point.y })),
		reset: vi.fn<() => void>(),
	};
}

describe("PointerInputProcessor", () => {
	let sink: Mock<MovementSink>;

	beforeEach(() => {
		sink = vi.fn<MovementSink>(() => true);
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe("baseline", () => {
		it("should only seed the baseline on the first sample", () => {
			const processor = new PointerInputProcessor(sink, { filter: new IdentityFilter() });

			expect(processor.updatePosition({ x: 10, y: 10 }, 0)).toBeNull();
			expect(processor.getLastFilteredPosition()).toEqual({ x: 10, y: 10 });
			expect(sink).not.toHaveBeenCalled();
		});

		it("should not forward a zero delta", () => {
			const processor = new PointerInputProcessor(sink, { filter: new IdentityFilter() });

			processor.updatePosition({ x: 10, y: 10 }, 0);
			expect(processor.updatePosition({ x: 10, y: 10 }, 1)).toBeNull();
			expect(sink).not.toHaveBeenCalled();
		});

		it("should not emit a jump when the mute filter is active", () => {
			const processor = new PointerInputProcessor(sink, { filter: new MuteFilter() });

			processor.updatePosition({ x: 5, y: 5 }, 1);
			processor.updatePosition({ x: 50, y: 50 }, 2);

			expect(sink).not.toHaveBeenCalled();
		});
	});

	describe("quantization", () => {
		it("should scale by sensitivity and forward the delta", () => {
			const processor = new PointerInputProcessor(sink, {
				filter: new IdentityFilter(),
				horizontalSensitivity: 3,
				verticalSensitivity: 3,
				globalScale: 1,
			});

			processor.updatePosition({ x: 0, y: 0 }, 0);
			const delta = processor.updatePosition({ x: 1, y: 0 }, 1);

			expect(delta).toEqual({ dx: 3, dy: 0 });
			expect(sink).toHaveBeenCalledTimes(1);
			expect(sink).toHaveBeenCalledWith(3, 0);
		});

		it("should default to 3x sensitivity and unit scale", () => {
			const processor = new PointerInputProcessor(sink);

			expect(processor.getSettings()).toEqual({
				horizontalSensitivity: 3,
				verticalSensitivity: 3,
				globalScale: 1,
				invertY: false,
			});
		});

		it("should apply per-axis sensitivity then global scale", () => {
			const processor = new PointerInputProcessor(sink, {
				horizontalSensitivity: 2,
				verticalSensitivity: 3,
				globalScale: 0.5,
			});

			processor.updatePosition({ x: 0, y: 0 }, 1);
			processor.updatePosition({ x: 4, y: 4 }, 2);

			expect(sink).toHaveBeenCalledWith(4, 6);
		});

		it("should round half away from zero in both directions", () => {
			const processor = new PointerInputProcessor(sink, {
				horizontalSensitivity: 1,
				verticalSensitivity: 1,
			});

			processor.updatePosition({ x: 0, y: 0 }, 1);
			processor.updatePosition({ x: 0.5, y: -0.5 }, 2);

			expect(sink).toHaveBeenCalledWith(1, -1);
		});

		it("should drop deltas that round to zero", () => {
			const processor = new PointerInputProcessor(sink, {
				horizontalSensitivity: 1,
				verticalSensitivity: 1,
			});

			processor.updatePosition({ x: 0, y: 0 }, 1);
			expect(processor.updatePosition({ x: 0.4, y: -0.4 }, 2)).toBeNull();
			expect(sink).not.toHaveBeenCalled();
		});

		it("should invert vertical motion when configured", () => {
			const processor = new PointerInputProcessor(sink, { invertY: true });

			processor.updatePosition({ x: 0, y: 0 }, 1);
			processor.updatePosition({ x: 0, y: 2 }, 2);

			expect(sink).toHaveBeenCalledWith(0, -6);
		});

		it("should leave range clamping to the sink", () => {
			const processor = new PointerInputProcessor(sink);

			processor.updatePosition({ x: 0, y: 0 }, 1);
			processor.updatePosition({ x: 100, y: 0 }, 2);

			expect(sink).toHaveBeenCalledWith(300, 0);
		});
	});

	describe("timestamps", () => {
		it("should use the clock when the timestamp is omitted or zero", () => {
			const filter = createSpyFilter();
			const now = vi.fn(() => 42);
			const processor = new PointerInputProcessor(sink, { filter, now });

			processor.updatePosition({ x: 1, y: 1 });
			processor.updatePosition({ x: 2, y: 2 }, 0);
			processor.updatePosition({ x: 3, y: 3 }, 5);

			expect(filter.filter.mock.calls.map((call) => call[1])).toEqual([42, 42, 5]);
			expect(now).toHaveBeenCalledTimes(2);
		});
	});

	describe("configuration", () => {
		it("should keep filter state when sensitivity changes", () => {
			const processor = new PointerInputProcessor(sink, {
				filter: new EmaFilter({ alpha: 0.5, minChange: 0 }),
			});

			processor.updatePosition({ x: 0, y: 0 }, 1);
			processor.updatePosition({ x: 10, y: 0 }, 2); // filtered 5 -> 15
			processor.setSensitivity({ horizontalSensitivity: 1 });
			processor.updatePosition({ x: 10, y: 0 }, 3); // filtered 7.5 -> 2.5

			expect(sink).toHaveBeenNthCalledWith(1, 15, 0);
			expect(sink).toHaveBeenNthCalledWith(2, 3, 0);
		});

		it("should swap filters without resetting them", () => {
			const first = createSpyFilter();
			const second = createSpyFilter();
			const processor = new PointerInputProcessor(sink, { filter: first });

			processor.setFilter(second);

			expect(processor.getFilter()).toBe(second);
			expect(first.reset).not.toHaveBeenCalled();
			expect(second.reset).not.toHaveBeenCalled();
		});

		it("should log filter swaps", () => {
			const processor = new PointerInputProcessor(sink);

			processor.setFilter(new MuteFilter());

			expect(console.log).toHaveBeenCalledWith(
				"[PointerInput] Changed input filter to: Mute",
			);
		});
	});

	describe("reset", () => {
		it("should clear the baseline and reset the filter", () => {
			const filter = createSpyFilter();
			const processor = new PointerInputProcessor(sink, { filter });

			processor.updatePosition({ x: 0, y: 0 }, 1);
			processor.reset();

			expect(filter.reset).toHaveBeenCalledTimes(1);
			expect(processor.getLastFilteredPosition()).toBeNull();

			// Next sample re-seeds instead of jumping from the old baseline
			expect(processor.updatePosition({ x: 100, y: 100 }, 2)).toBeNull();
			expect(sink).not.toHaveBeenCalled();
		});
	});

	describe("sink results", () => {
		it("should count and log rejected reports without retrying", () => {
			sink.mockReturnValue(false);
			const processor = new PointerInputProcessor(sink);

			processor.updatePosition({ x: 0, y: 0 }, 1);
			processor.updatePosition({ x: 1, y: 0 }, 2);

			expect(sink).toHaveBeenCalledTimes(1);
			expect(processor.getStats()).toEqual({ emitted: 1, suppressed: 1, rejected: 1 });
			expect(console.warn).toHaveBeenCalledWith(
				"[PointerInput] Movement report rejected: (3, 0)",
			);
		});

		it("should propagate errors thrown by the sink", () => {
			sink.mockImplementation(() => {
				throw new Error("transport closed");
			});
			const processor = new PointerInputProcessor(sink);

			processor.updatePosition({ x: 0, y: 0 }, 1);

			expect(() => processor.updatePosition({ x: 1, y: 0 }, 2)).toThrow("transport closed");
		});

		it("should suppress non-finite samples", () => {
			const processor = new PointerInputProcessor(sink);

			processor.updatePosition({ x: 0, y: 0 }, 1);
			expect(processor.updatePosition({ x: Number.NaN, y: 0 }, 2)).toBeNull();
			expect(processor.getLastFilteredPosition()).toEqual({ x: 0, y: 0 });
			expect(sink).not.toHaveBeenCalled();
		});
	});
});

describe("quantizeDelta (pure function)", () => {
	const settings = {
		horizontalSensitivity: 3,
		verticalSensitivity: 2,
		globalScale: 1,
		invertY: false,
	};

	it("should scale and round each axis", () => {
		expect(quantizeDelta({ x: 1.2, y: -0.75 }, settings)).toEqual({ dx: 4, dy: -2 });
	});

	it("should never return negative zero", () => {
		const delta = quantizeDelta({ x: -0.1, y: 0.1 }, { ...settings, invertY: true });

		expect(Object.is(delta.dx, 0)).toBe(true);
		expect(Object.is(delta.dy, 0)).toBe(true);
	});
});
