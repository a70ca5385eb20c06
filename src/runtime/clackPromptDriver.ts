import { isCancel, multiselect, select, text } from "@clack/prompts";
import pc from "picocolors";

import type {
	MultiselectPromptOptions,
	PromptDriver,
	PromptSelection,
	SelectPromptOptions,
	TextPromptOptions,
} from "./promptDriver.js";
import { PromptCancelledError, selected, skipped } from "./promptDriver.js";

/** Option value used for the skip control of single-choice dialogs. */
export const SKIP_OPTION_VALUE = "__skip__";

/** Radio/checkbox dialog presentation built on the stock clack prompts. */
export class ClackPromptDriver implements PromptDriver {
	readonly name: string = "dialog";

	async text(options: TextPromptOptions): Promise<string> {
		const result = await text({
			message: options.message,
			initialValue: options.initialValue,
			placeholder: options.placeholder,
			defaultValue: options.defaultValue,
			validate: options.validate,
		});
		if (isCancel(result)) {
			throw new PromptCancelledError();
		}
		return result;
	}

	async select<Value extends string>(
		options: SelectPromptOptions<Value>,
	): Promise<PromptSelection<Value>> {
		const selectOptions: Array<{ value: string; label: string; hint?: string }> = options.options.map(
			(option) => ({
				value: option.value,
				label: option.label,
				hint: option.hint,
			}),
		);
		if (options.allowSkip) {
			selectOptions.push({ value: SKIP_OPTION_VALUE, label: pc.dim("Skip"), hint: "Leave unanswered" });
		}
		const initialValue: string | undefined = options.initialValue;
		const result = await select({
			message: options.message,
			options: selectOptions,
			initialValue,
			maxItems: options.maxItems,
		});
		if (isCancel(result)) {
			throw new PromptCancelledError();
		}
		if (result === SKIP_OPTION_VALUE) {
			return skipped();
		}
		const chosen = options.options.find((option) => option.value === result);
		if (!chosen) {
			throw new Error(`Select prompt returned an unknown value: ${result}`);
		}
		return selected(chosen.value);
	}

	async multiselect<Value extends string>(
		options: MultiselectPromptOptions<Value>,
	): Promise<PromptSelection<Value[]>> {
		const multiselectOptions: Array<{ value: string; label: string; hint?: string }> =
			options.options.map((option) => ({
				value: option.value,
				label: option.label,
				hint: option.hint,
			}));
		const initialValues: string[] | undefined = options.initialValues;
		// The stock checkbox list always shows every option; `maxItems` only applies to the preview list.
		const result = await multiselect({
			message: options.message,
			options: multiselectOptions,
			initialValues,
			required: false,
		});
		if (isCancel(result)) {
			throw new PromptCancelledError();
		}
		const picked = new Set(result);
		if (picked.size === 0 && options.allowSkip) {
			return skipped();
		}
		return selected(
			options.options.filter((option) => picked.has(option.value)).map((option) => option.value),
		);
	}
}
