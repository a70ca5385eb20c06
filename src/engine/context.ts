import { ContextTypeError, NoSuchOptionError } from "./errors.js";

export type ContextValue =
	| string
	| number
	| boolean
	| null
	| readonly ContextValue[]
	| { readonly [key: string]: ContextValue };

export type ContextSnapshot = Readonly<Record<string, ContextValue>>;

export interface BuildContextOptions {
	/** Key of the sticky compatibility flag. Defaults to `legacy_mode`. */
	legacyModeKey?: string;
}

export const DEFAULT_LEGACY_MODE_KEY = "legacy_mode";

/**
 * Accumulates every answer collected during a wizard run.
 *
 * Keys are never removed. The compatibility flag stored under `legacyModeKey`
 * can only go from unset/false to true.
 */
export class BuildContext {
	readonly legacyModeKey: string;
	private readonly values = new Map<string, ContextValue>();
	/** Menus answered or skipped during this run. Never part of the snapshot. */
	private readonly visitedMenus = new Set<string>();

	constructor(seed?: Readonly<Record<string, ContextValue | undefined>>, options?: BuildContextOptions) {
		this.legacyModeKey = options?.legacyModeKey ?? DEFAULT_LEGACY_MODE_KEY;
		if (seed) {
			for (const [key, value] of Object.entries(seed)) {
				if (value !== undefined) {
					this.set(key, value);
				}
			}
		}
	}

	has(key: string): boolean {
		return this.values.has(key);
	}

	get(key: string): ContextValue | undefined {
		return this.values.get(key);
	}

	require(key: string): ContextValue {
		const value = this.values.get(key);
		if (value === undefined) {
			throw new NoSuchOptionError(key);
		}
		return value;
	}

	string(key: string): string {
		const value = this.require(key);
		if (typeof value !== "string") {
			throw new ContextTypeError(key, `holds ${describeValue(value)}, expected a string.`);
		}
		return value;
	}

	boolean(key: string): boolean {
		const value = this.require(key);
		if (typeof value !== "boolean") {
			throw new ContextTypeError(key, `holds ${describeValue(value)}, expected a boolean.`);
		}
		return value;
	}

	/** True when the key holds a truthy value. Missing keys read as false. */
	isEnabled(key: string): boolean {
		const value = this.values.get(key);
		return value !== undefined && value !== null && value !== false && value !== 0 && value !== "";
	}

	set(key: string, value: ContextValue): this {
		if (key === this.legacyModeKey) {
			if (typeof value !== "boolean") {
				throw new ContextTypeError(key, `must be a boolean, got ${describeValue(value)}.`);
			}
			if (!value && this.legacyMode) {
				throw new ContextTypeError(key, "cannot be cleared once it has been enabled.");
			}
		}
		this.values.set(key, value);
		return this;
	}

	get legacyMode(): boolean {
		return this.values.get(this.legacyModeKey) === true;
	}

	enableLegacyMode(): void {
		this.values.set(this.legacyModeKey, true);
	}

	markVisited(menuKey: string): void {
		this.visitedMenus.add(menuKey);
	}

	wasVisited(menuKey: string): boolean {
		return this.visitedMenus.has(menuKey);
	}

	keys(): string[] {
		return [...this.values.keys()];
	}

	entries(): Array<[string, ContextValue]> {
		return [...this.values.entries()];
	}

	get size(): number {
		return this.values.size;
	}

	/** Deep-frozen copy handed to the renderer. */
	freeze(): ContextSnapshot {
		const snapshot: Record<string, ContextValue> = {};
		for (const [key, value] of this.values) {
			snapshot[key] = deepFreeze(value);
		}
		return Object.freeze(snapshot);
	}
}

function deepFreeze(value: ContextValue): ContextValue {
	if (Array.isArray(value)) {
		return Object.freeze(value.map((item: ContextValue) => deepFreeze(item)));
	}
	if (isContextRecord(value)) {
		const copy: Record<string, ContextValue> = {};
		for (const [key, item] of Object.entries(value)) {
			copy[key] = deepFreeze(item);
		}
		return Object.freeze(copy);
	}
	return value;
}

function isContextRecord(value: ContextValue): value is { readonly [key: string]: ContextValue } {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: ContextValue): string {
	if (value === null) {
		return "null";
	}
	if (Array.isArray(value)) {
		return "a list";
	}
	return typeof value === "object" ? "an object" : `${typeof value} ${JSON.stringify(value)}`;
}
