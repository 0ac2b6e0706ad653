import { useCallback, useEffect, useRef } from "react";
import {
	type MovementDelta,
	type MovementSink,
	PointerInputProcessor,
} from "../processing/PointerInputProcessor";
import { createFilter, type Vector2 } from "../smoothing";
import type { PointerSettings } from "./usePointerSettings";

interface UsePointerInputOptions {
	settings: PointerSettings;
	onMove: MovementSink;
}

export interface UsePointerInputReturn {
	updatePosition: (position: Vector2, timestamp?: number) => MovementDelta | null;
	reset: () => void;
	getProcessor: () => PointerInputProcessor;
}

/**
 * Owns one PointerInputProcessor for the lifetime of the component.
 * Sensitivity changes apply immediately without touching filter state;
 * a new filter type or new filter params rebuild the filter and reset.
 */
export function usePointerInput({
	settings,
	onMove,
}: UsePointerInputOptions): UsePointerInputReturn {
	const {
		filterType,
		filterParams,
		horizontalSensitivity,
		verticalSensitivity,
		globalScale,
		invertY,
	} = settings;

	// Latest sink, so callers can pass inline callbacks
	const onMoveRef = useRef(onMove);
	onMoveRef.current = onMove;

	const filterKey = `${filterType}:${JSON.stringify(filterParams)}`;
	const appliedFilterKeyRef = useRef(filterKey);

	const processorRef = useRef<PointerInputProcessor | null>(null);
	const getProcessor = useCallback((): PointerInputProcessor => {
		if (processorRef.current === null) {
			processorRef.current = new PointerInputProcessor(
				(dx, dy) => onMoveRef.current(dx, dy),
				{
					filter: createFilter(filterType, filterParams),
					horizontalSensitivity,
					verticalSensitivity,
					globalScale,
					invertY,
				},
			);
		}
		return processorRef.current;
		// Initial values only; later changes go through the effects below
		// eslint-disable-next-line react-hooks/exhaustive-deps
	}, []);

	// Rebuild filter when type or params change
	useEffect(() => {
		if (appliedFilterKeyRef.current === filterKey) return;
		appliedFilterKeyRef.current = filterKey;
		const processor = getProcessor();
		processor.setFilter(createFilter(filterType, filterParams));
		processor.reset();
		// filterKey covers filterType and filterParams
		// eslint-disable-next-line react-hooks/exhaustive-deps
	}, [filterKey, getProcessor]);

	useEffect(() => {
		getProcessor().setSensitivity({
			horizontalSensitivity,
			verticalSensitivity,
			globalScale,
			invertY,
		});
	}, [horizontalSensitivity, verticalSensitivity, globalScale, invertY, getProcessor]);

	const updatePosition = useCallback(
		(position: Vector2, timestamp?: number) =>
			getProcessor().updatePosition(position, timestamp),
		[getProcessor],
	);

	const reset = useCallback(() => {
		getProcessor().reset();
	}, [getProcessor]);

	return { updatePosition, reset, getProcessor };
}
