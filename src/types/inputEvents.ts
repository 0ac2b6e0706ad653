/**
 * Discrete button/direction events produced by a gesture classifier and
 * consumed by input mappings alongside the pointer motion stream.
 */

export const BUTTON_IDS = ["Primary", "Secondary", "Tertiary"] as const;
export type ButtonId = (typeof BUTTON_IDS)[number];

export const PHASES = [
	"None",
	"Press",
	"Release",
	"HoldBegin",
	"HoldEnd",
	"Tap",
	"DoubleTap",
	"LongPress",
] as const;
export type Phase = (typeof PHASES)[number];

export const DIRECTIONS = ["None", "Up", "Right", "Down", "Left"] as const;
export type Direction = (typeof DIRECTIONS)[number];

/**
 * Immutable value: either a button in some phase, or a direction.
 * Direction events always carry id Primary and phase None, so two events
 * are equal exactly when (id, phase, direction) match.
 */
export class DiscreteInputEvent {
	/** "No event"; also what forButton("Primary", "None") and forDirection("None") produce */
	static readonly NONE = new DiscreteInputEvent("Primary", "None", "None");

	readonly id: ButtonId;
	readonly phase: Phase;
	readonly direction: Direction;

	private constructor(id: ButtonId, phase: Phase, direction: Direction) {
		this.id = id;
		this.phase = phase;
		this.direction = direction;
	}

	static forButton(id: ButtonId, phase: Phase): DiscreteInputEvent {
		return new DiscreteInputEvent(id, phase, "None");
	}

	static forDirection(direction: Direction): DiscreteInputEvent {
		return new DiscreteInputEvent("Primary", "None", direction);
	}

	get isNone(): boolean {
		return this.phase === "None" && this.direction === "None";
	}

	get isButton(): boolean {
		return this.phase !== "None";
	}

	get isDirection(): boolean {
		return this.direction !== "None";
	}

	get isPress(): boolean {
		return this.phase === "Press";
	}

	get isRelease(): boolean {
		return this.phase === "Release";
	}

	get isHoldBegin(): boolean {
		return this.phase === "HoldBegin";
	}

	get isHoldEnd(): boolean {
		return this.phase === "HoldEnd";
	}

	get isTap(): boolean {
		return this.phase === "Tap";
	}

	get isDoubleTap(): boolean {
		return this.phase === "DoubleTap";
	}

	get isLongPress(): boolean {
		return this.phase === "LongPress";
	}

	get isUp(): boolean {
		return this.direction === "Up";
	}

	get isRight(): boolean {
		return this.direction === "Right";
	}

	get isDown(): boolean {
		return this.direction === "Down";
	}

	get isLeft(): boolean {
		return this.direction === "Left";
	}

	equals(other: DiscreteInputEvent): boolean {
		return (
			this.id === other.id &&
			this.phase === other.phase &&
			this.direction === other.direction
		);
	}

	/** Structural hash, unique per (id, phase, direction) */
	hashCode(): number {
		const id = BUTTON_IDS.indexOf(this.id);
		const phase = PHASES.indexOf(this.phase);
		const direction = DIRECTIONS.indexOf(this.direction);
		return (id * PHASES.length + phase) * DIRECTIONS.length + direction;
	}

	toString(): string {
		if (this.direction !== "None") return `Direction.${this.direction}`;
		if (this.phase === "None") return "None";
		return `${this.id}.${this.phase}`;
	}
}

// ===== Predefined events =====

export const PRIMARY_PRESS = DiscreteInputEvent.forButton("Primary", "Press");
export const PRIMARY_RELEASE = DiscreteInputEvent.forButton("Primary", "Release");
export const PRIMARY_TAP = DiscreteInputEvent.forButton("Primary", "Tap");
export const PRIMARY_DOUBLE_TAP = DiscreteInputEvent.forButton("Primary", "DoubleTap");
export const PRIMARY_LONG_PRESS = DiscreteInputEvent.forButton("Primary", "LongPress");
export const SECONDARY_PRESS = DiscreteInputEvent.forButton("Secondary", "Press");
export const SECONDARY_RELEASE = DiscreteInputEvent.forButton("Secondary", "Release");
export const SECONDARY_TAP = DiscreteInputEvent.forButton("Secondary", "Tap");
export const SECONDARY_DOUBLE_TAP = DiscreteInputEvent.forButton("Secondary", "DoubleTap");
export const SECONDARY_LONG_PRESS = DiscreteInputEvent.forButton("Secondary", "LongPress");
export const TERTIARY_PRESS = DiscreteInputEvent.forButton("Tertiary", "Press");
export const TERTIARY_RELEASE = DiscreteInputEvent.forButton("Tertiary", "Release");
export const TERTIARY_TAP = DiscreteInputEvent.forButton("Tertiary", "Tap");
export const TERTIARY_DOUBLE_TAP = DiscreteInputEvent.forButton("Tertiary", "DoubleTap");
export const TERTIARY_LONG_PRESS = DiscreteInputEvent.forButton("Tertiary", "LongPress");
export const UP = DiscreteInputEvent.forDirection("Up");
export const RIGHT = DiscreteInputEvent.forDirection("Right");
export const DOWN = DiscreteInputEvent.forDirection("Down");
export const LEFT = DiscreteInputEvent.forDirection("Left");

/** Mappable button phases, in the order they are listed for each button */
const MAPPABLE_PHASES: readonly Phase[] = ["Press", "Release", "Tap", "DoubleTap", "LongPress"];

/**
 * Every predefined event: None, each button's mappable phases, then each
 * direction.
 */
export function allInputEvents(): DiscreteInputEvent[] {
	const events = [DiscreteInputEvent.NONE];
	for (const id of BUTTON_IDS) {
		for (const phase of MAPPABLE_PHASES) {
			events.push(DiscreteInputEvent.forButton(id, phase));
		}
	}
	for (const direction of DIRECTIONS) {
		if (direction !== "None") events.push(DiscreteInputEvent.forDirection(direction));
	}
	return events;
}

function isMember<T extends string>(values: readonly T[], value: string): value is T {
	return values.some((candidate) => candidate === value);
}

/**
 * Parse the toString() form back into an event.
 * Returns null for anything toString() cannot produce.
 */
export function parseInputEvent(text: string): DiscreteInputEvent | null {
	if (text === "None") return DiscreteInputEvent.NONE;

	const parts = text.split(".");
	if (parts.length !== 2) return null;
	const [prefix, suffix] = parts;

	if (prefix === "Direction") {
		if (!isMember(DIRECTIONS, suffix) || suffix === "None") return null;
		return DiscreteInputEvent.forDirection(suffix);
	}

	if (!isMember(BUTTON_IDS, prefix) || !isMember(PHASES, suffix) || suffix === "None") {
		return null;
	}
	return DiscreteInputEvent.forButton(prefix, suffix);
}
