import { useCallback, useState } from "react";
import { SENSITIVITY_DEFAULTS } from "../constants/pointer";
import { DeviceService } from "../services/DeviceService";
import { isFilterType } from "../smoothing";
import type { FilterParams, FilterType } from "../smoothing";

// Storage keys for persisted settings
const FILTER_TYPE_STORAGE_KEY = "pointer-motion-filter-type";
const FILTER_PARAMS_STORAGE_KEY = "pointer-motion-filter-params";
const HORIZONTAL_SENSITIVITY_STORAGE_KEY = "pointer-motion-horizontal-sensitivity";
const VERTICAL_SENSITIVITY_STORAGE_KEY = "pointer-motion-vertical-sensitivity";
const GLOBAL_SCALE_STORAGE_KEY = "pointer-motion-global-scale";
const INVERT_Y_STORAGE_KEY = "pointer-motion-invert-y";

const DEFAULT_FILTER_TYPE: FilterType = "oneEuro";

export interface PointerSettings {
	// Filtering
	filterType: FilterType;
	filterParams: FilterParams;

	// Sensitivity
	horizontalSensitivity: number;
	verticalSensitivity: number;
	globalScale: number;
	invertY: boolean;
}

export interface PointerSettingsSetters {
	/** Switching filter type drops params tuned for the previous filter */
	setFilterType: (type: FilterType) => void;
	setFilterParam: (key: string, value: number) => void;
	setHorizontalSensitivity: (value: number) => void;
	setVerticalSensitivity: (value: number) => void;
	setGlobalScale: (value: number) => void;
	setInvertY: (value: boolean) => void;
}

export interface UsePointerSettingsReturn {
	settings: PointerSettings;
	setters: PointerSettingsSetters;
}

function readNumber(key: string, fallback: number): number {
	const stored = DeviceService.getStorageItem(key);
	if (stored) {
		const parsed = Number.parseFloat(stored);
		if (Number.isFinite(parsed)) return parsed;
	}
	return fallback;
}

function readFilterParams(): FilterParams {
	const stored = DeviceService.getStorageItem(FILTER_PARAMS_STORAGE_KEY);
	if (!stored) return {};
	try {
		const parsed: unknown = JSON.parse(stored);
		if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
			return {};
		}
		const params: FilterParams = {};
		for (const [key, value] of Object.entries(parsed)) {
			if (typeof value === "number" && Number.isFinite(value)) params[key] = value;
		}
		return params;
	} catch {
		return {};
	}
}

/**
 * Hook for the localStorage-persisted pointer configuration.
 * Invalid stored values fall back to defaults.
 */
export function usePointerSettings(): UsePointerSettingsReturn {
	const [filterType, setFilterTypeInternal] = useState<FilterType>(() => {
		const stored = DeviceService.getStorageItem(FILTER_TYPE_STORAGE_KEY);
		return isFilterType(stored) ? stored : DEFAULT_FILTER_TYPE;
	});

	const [filterParams, setFilterParamsInternal] = useState<FilterParams>(readFilterParams);

	const [horizontalSensitivity, setHorizontalSensitivityInternal] = useState(() =>
		readNumber(HORIZONTAL_SENSITIVITY_STORAGE_KEY, SENSITIVITY_DEFAULTS.HORIZONTAL),
	);

	const [verticalSensitivity, setVerticalSensitivityInternal] = useState(() =>
		readNumber(VERTICAL_SENSITIVITY_STORAGE_KEY, SENSITIVITY_DEFAULTS.VERTICAL),
	);

	const [globalScale, setGlobalScaleInternal] = useState(() =>
		readNumber(GLOBAL_SCALE_STORAGE_KEY, SENSITIVITY_DEFAULTS.GLOBAL_SCALE),
	);

	const [invertY, setInvertYInternal] = useState(() => {
		return DeviceService.getStorageItem(INVERT_Y_STORAGE_KEY) === "true";
	});

	// Wrapped setters that persist to localStorage
	const setFilterType = useCallback((type: FilterType) => {
		setFilterTypeInternal(type);
		setFilterParamsInternal({});
		DeviceService.setStorageItem(FILTER_TYPE_STORAGE_KEY, type);
		DeviceService.setStorageItem(FILTER_PARAMS_STORAGE_KEY, "{}");
	}, []);

	const setFilterParam = useCallback((key: string, value: number) => {
		setFilterParamsInternal((previous) => {
			const next = { ...previous, [key]: value };
			DeviceService.setStorageItem(FILTER_PARAMS_STORAGE_KEY, JSON.stringify(next));
			return next;
		});
	}, []);

	const setHorizontalSensitivity = useCallback((value: number) => {
		setHorizontalSensitivityInternal(value);
		DeviceService.setStorageItem(HORIZONTAL_SENSITIVITY_STORAGE_KEY, String(value));
	}, []);

	const setVerticalSensitivity = useCallback((value: number) => {
		setVerticalSensitivityInternal(value);
		DeviceService.setStorageItem(VERTICAL_SENSITIVITY_STORAGE_KEY, String(value));
	}, []);

	const setGlobalScale = useCallback((value: number) => {
		setGlobalScaleInternal(value);
		DeviceService.setStorageItem(GLOBAL_SCALE_STORAGE_KEY, String(value));
	}, []);

	const setInvertY = useCallback((value: boolean) => {
		setInvertYInternal(value);
		DeviceService.setStorageItem(INVERT_Y_STORAGE_KEY, String(value));
	}, []);

	return {
		settings: {
			filterType,
			filterParams,
			horizontalSensitivity,
			verticalSensitivity,
			globalScale,
			invertY,
		},
		setters: {
			setFilterType,
			setFilterParam,
			setHorizontalSensitivity,
			setVerticalSensitivity,
			setGlobalScale,
			setInvertY,
		},
	};
}
