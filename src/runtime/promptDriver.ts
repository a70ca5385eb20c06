import { NonInteractiveInputError } from "../engine/errors.js";

export { PromptCancelledError } from "../engine/errors.js";

export interface PromptOption<Value extends string = string> {
	value: Value;
	label: string;
	/** Long-form description, shown as a hint or in the preview pane. */
	hint?: string;
}

export type PromptSelection<Value> =
	| { kind: "selected"; value: Value }
	| { kind: "skipped" };

export interface SelectPromptOptions<Value extends string = string> {
	message: string;
	description?: string;
	options: Array<PromptOption<Value>>;
	initialValue?: Value;
	allowSkip?: boolean;
	maxItems?: number;
}

export interface MultiselectPromptOptions<Value extends string = string> {
	message: string;
	description?: string;
	options: Array<PromptOption<Value>>;
	initialValues?: Value[];
	allowSkip?: boolean;
	maxItems?: number;
}

export interface TextPromptOptions {
	message: string;
	initialValue?: string;
	placeholder?: string;
	defaultValue?: string;
	validate?: (value: string) => string | undefined;
}

/**
 * Presentation strategy used by the menus. Every method throws
 * `PromptCancelledError` when the user aborts the prompt.
 */
export interface PromptDriver {
	readonly name: string;
	select<Value extends string>(options: SelectPromptOptions<Value>): Promise<PromptSelection<Value>>;
	multiselect<Value extends string>(
		options: MultiselectPromptOptions<Value>,
	): Promise<PromptSelection<Value[]>>;
	text(options: TextPromptOptions): Promise<string>;
}

export const selected = <Value>(value: Value): PromptSelection<Value> => ({
	kind: "selected",
	value,
});

export const skipped = <Value>(): PromptSelection<Value> => ({ kind: "skipped" });

/** Answers every prompt with its declared default and never touches the terminal. */
export class NonInteractivePromptDriver implements PromptDriver {
	readonly name = "non-interactive";

	async select<Value extends string>(
		options: SelectPromptOptions<Value>,
	): Promise<PromptSelection<Value>> {
		const match = options.options.find((option) => option.value === options.initialValue);
		return match ? selected(match.value) : skipped();
	}

	async multiselect<Value extends string>(
		options: MultiselectPromptOptions<Value>,
	): Promise<PromptSelection<Value[]>> {
		if (!options.initialValues) {
			return skipped();
		}
		const defaults = new Set<string>(options.initialValues);
		return selected(
			options.options.filter((option) => defaults.has(option.value)).map((option) => option.value),
		);
	}

	async text(options: TextPromptOptions): Promise<string> {
		const value = options.defaultValue ?? options.initialValue;
		if (value === undefined) {
			throw new NonInteractiveInputError(
				`"${options.message}" needs an answer, but the wizard is running without interaction.`,
			);
		}
		const error = options.validate?.(value);
		if (error) {
			throw new NonInteractiveInputError(`${options.message}: ${error}`);
		}
		return value;
	}
}
