export * from "./smoothing";
export {
	PointerInputProcessor,
	quantizeDelta,
} from "./processing/PointerInputProcessor";
export type {
	MovementDelta,
	MovementSink,
	PointerInputOptions,
	PointerInputStats,
	SensitivitySettings,
} from "./processing/PointerInputProcessor";
export * from "./types/inputEvents";
export { MOVEMENT_LIMIT, SENSITIVITY_DEFAULTS } from "./constants/pointer";
export { clampMovement, roundHalfAwayFromZero } from "./utils/quantize";
export { TimerService } from "./services/TimerService";
export { usePointerInput } from "./hooks/usePointerInput";
export type { UsePointerInputReturn } from "./hooks/usePointerInput";
export { usePointerSettings } from "./hooks/usePointerSettings";
export type {
	PointerSettings,
	PointerSettingsSetters,
	UsePointerSettingsReturn,
} from "./hooks/usePointerSettings";
