import { act, renderHook } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import type { MovementSink } from "../processing/PointerInputProcessor";
import { usePointerInput } from "./usePointerInput";
import type { PointerSettings } from "./usePointerSettings";

function createSettings(overrides: Partial<PointerSettings> = {}): PointerSettings {
	return {
		filterType: "none",
		filterParams: {},
		horizontalSensitivity: 3,
		verticalSensitivity: 3,
		globalScale: 1,
		invertY: false,
		...overrides,
	};
}

describe("usePointerInput", () => {
	let onMove: Mock<MovementSink>;

	beforeEach(() => {
		onMove = vi.fn<MovementSink>(() => true);
		vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should forward quantized deltas to onMove", () => {
		const { result } = renderHook(() =>
			usePointerInput({ settings: createSettings(), onMove }),
		);

		act(() => {
			result.current.updatePosition({ x: 0, y: 0 }, 1);
			result.current.updatePosition({ x: 1, y: 0 }, 2);
		});

		expect(onMove).toHaveBeenCalledTimes(1);
		expect(onMove).toHaveBeenCalledWith(3, 0);
	});

	it("should keep the same processor across renders", () => {
		const { result, rerender } = renderHook(() =>
			usePointerInput({ settings: createSettings(), onMove }),
		);
		const first = result.current.getProcessor();

		rerender();

		expect(result.current.getProcessor()).toBe(first);
	});

	it("should apply sensitivity changes without resetting the baseline", () => {
		const { result, rerender } = renderHook(
			({ settings }) => usePointerInput({ settings, onMove }),
			{ initialProps: { settings: createSettings() } },
		);

		act(() => {
			result.current.updatePosition({ x: 0, y: 0 }, 1);
			result.current.updatePosition({ x: 1, y: 0 }, 2);
		});
		rerender({ settings: createSettings({ horizontalSensitivity: 10 }) });
		act(() => {
			result.current.updatePosition({ x: 2, y: 0 }, 3);
		});

		expect(onMove).toHaveBeenNthCalledWith(1, 3, 0);
		expect(onMove).toHaveBeenNthCalledWith(2, 10, 0);
	});

	it("should rebuild the filter and reset when the filter type changes", () => {
		const { result, rerender } = renderHook(
			({ settings }) => usePointerInput({ settings, onMove }),
			{ initialProps: { settings: createSettings() } },
		);

		act(() => {
			result.current.updatePosition({ x: 0, y: 0 }, 1);
		});
		rerender({ settings: createSettings({ filterType: "mute" }) });
		act(() => {
			result.current.updatePosition({ x: 5, y: 5 }, 2);
			result.current.updatePosition({ x: 9, y: 9 }, 3);
		});

		expect(result.current.getProcessor().getFilter().type).toBe("mute");
		expect(onMove).not.toHaveBeenCalled();
	});

	it("should not rebuild the filter when settings are recreated with equal values", () => {
		const { result, rerender } = renderHook(
			({ settings }) => usePointerInput({ settings, onMove }),
			{ initialProps: { settings: createSettings({ filterType: "ema" }) } },
		);
		const filter = result.current.getProcessor().getFilter();

		rerender({ settings: createSettings({ filterType: "ema" }) });

		expect(result.current.getProcessor().getFilter()).toBe(filter);
	});

	it("should call the latest onMove callback", () => {
		const replacement = vi.fn<MovementSink>(() => true);
		const { result, rerender } = renderHook(
			({ sink }) => usePointerInput({ settings: createSettings(), onMove: sink }),
			{ initialProps: { sink: onMove } },
		);

		rerender({ sink: replacement });
		act(() => {
			result.current.updatePosition({ x: 0, y: 0 }, 1);
			result.current.updatePosition({ x: 0, y: 1 }, 2);
		});

		expect(onMove).not.toHaveBeenCalled();
		expect(replacement).toHaveBeenCalledWith(0, 3);
	});

	it("should re-seed the baseline after reset", () => {
		const { result } = renderHook(() =>
			usePointerInput({ settings: createSettings(), onMove }),
		);

		act(() => {
			result.current.updatePosition({ x: 0, y: 0 }, 1);
			result.current.reset();
			result.current.updatePosition({ x: 50, y: 50 }, 2);
		});

		expect(onMove).not.toHaveBeenCalled();
	});
});
