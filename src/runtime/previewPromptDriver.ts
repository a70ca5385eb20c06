import { isCancel } from "@clack/prompts";

import { ClackPromptDriver } from "./clackPromptDriver.js";
import { multiselectWithPreview, selectWithPreview } from "./previewPrompts.js";
import type {
	MultiselectPromptOptions,
	PromptSelection,
	SelectPromptOptions,
} from "./promptDriver.js";
import { PromptCancelledError } from "./promptDriver.js";

/**
 * Rich terminal list with a description pane under the choices. Text questions
 * fall back to the stock clack prompt.
 */
export class PreviewPromptDriver extends ClackPromptDriver {
	override readonly name: string = "preview";

	constructor(private readonly columns?: number) {
		super();
	}

	override async select<Value extends string>(
		options: SelectPromptOptions<Value>,
	): Promise<PromptSelection<Value>> {
		const result = await selectWithPreview({
			message: options.message,
			options: options.options,
			initialValue: options.initialValue,
			maxItems: options.maxItems,
			allowSkip: options.allowSkip,
			columns: this.columns,
		});
		if (isCancel(result)) {
			throw new PromptCancelledError();
		}
		return result;
	}

	override async multiselect<Value extends string>(
		options: MultiselectPromptOptions<Value>,
	): Promise<PromptSelection<Value[]>> {
		const result = await multiselectWithPreview({
			message: options.message,
			options: options.options,
			initialValues: options.initialValues,
			maxItems: options.maxItems,
			allowSkip: options.allowSkip,
			columns: this.columns,
		});
		if (isCancel(result)) {
			throw new PromptCancelledError();
		}
		return result;
	}
}
