import type { PromptDriver, PromptSelection } from "../runtime/promptDriver.js";
import { PromptCancelledError } from "../runtime/promptDriver.js";
import type { BuildContext } from "./context.js";
import { MenuDefinitionError } from "./errors.js";
import { type MenuEntry, visibleEntries } from "./menuEntry.js";
import {
	type AfterAskHook,
	type BaseMenuInit,
	buildEntries,
	type ChoiceOutcome,
	keepContext,
	type MenuFlag,
	type MenuModel,
	recordEntry,
} from "./menuModel.js";

export type EntriesResolver = (context: BuildContext) => readonly MenuEntry[] | undefined;

const noEntries: EntriesResolver = () => undefined;

export interface MultiMenuInit extends BaseMenuInit {
	/** Stable identifier used in logs. Each entry writes its own code as a boolean key. */
	id: string;
	defaultCodes?: string[];
	beforeAsk?: (context: BuildContext, menu: MultiSelectMenu) => readonly MenuEntry[] | undefined;
	afterAsk?: AfterAskHook<MultiSelectMenu>;
}

export class MultiSelectMenu implements MenuModel {
	readonly kind = "multi";
	readonly id: string;
	readonly title: string;
	readonly description: string;
	readonly entries: readonly MenuEntry[];
	readonly defaultCodes: readonly string[] | undefined;
	private readonly beforeAsk: EntriesResolver;
	private readonly afterAsk: AfterAskHook<MultiSelectMenu>;

	constructor(init: MultiMenuInit) {
		this.id = init.id;
		this.title = init.title;
		this.description = init.description ?? "";
		this.entries = buildEntries(this.label, init.entries);
		this.afterAsk = init.afterAsk ?? keepContext;
		const beforeAsk = init.beforeAsk;
		this.beforeAsk = beforeAsk ? (context) => beforeAsk(context, this) : noEntries;

		const unknown = (init.defaultCodes ?? []).filter((code) => !this.findEntry(code));
		if (unknown.length > 0) {
			throw new MenuDefinitionError(
				`${this.label} lists unknown default entries: ${unknown.join(", ")}.`,
			);
		}
		this.defaultCodes = init.defaultCodes;
	}

	get label(): string {
		return `"${this.title}" (${this.id})`;
	}

	get visitKey(): string {
		return `multi:${this.id}`;
	}

	findEntry(code: string): MenuEntry | undefined {
		return this.entries.find((entry) => entry.code === code);
	}

	/** Entries left unpicked stay absent, so a visited menu needs no further input. */
	needsInput(context: BuildContext): boolean {
		return (
			!context.wasVisited(this.visitKey) &&
			this.entries.some((entry) => context.get(entry.code) === undefined)
		);
	}

	async collectChoice(context: BuildContext, driver: PromptDriver): Promise<ChoiceOutcome> {
		let chosen = this.beforeAsk(context);

		if (!chosen) {
			// An explicit false from `--no-<flag>` is an answer too.
			const unknownEntries = this.entries.filter((entry) => context.get(entry.code) === undefined);
			const available = visibleEntries(unknownEntries, context);
			if (available.length === 0) {
				context.markVisited(this.visitKey);
				return { kind: "skipped" };
			}

			let selection: PromptSelection<string[]>;
			try {
				selection = await driver.multiselect({
					message: this.title,
					description: this.description,
					options: available.map((entry) => ({
						value: entry.code,
						label: entry.userView,
						hint: entry.description,
					})),
					initialValues: this.defaultCodes
						? this.defaultCodes.filter((code) => available.some((entry) => entry.code === code))
						: undefined,
					allowSkip: true,
				});
			} catch (error) {
				if (error instanceof PromptCancelledError) {
					return { kind: "cancelled" };
				}
				throw error;
			}

			if (selection.kind === "skipped") {
				context.markVisited(this.visitKey);
				return { kind: "skipped" };
			}
			const picked = new Set(selection.value);
			chosen = available.filter((entry) => picked.has(entry.code));
		}

		for (const entry of chosen) {
			recordEntry(context, entry, entry.code, true, `${entry.code}_info`);
		}
		context.markVisited(this.visitKey);
		return { kind: "chosen", entries: chosen };
	}

	postProcess(context: BuildContext): BuildContext {
		return this.afterAsk(context, this);
	}

	flagSurface(): MenuFlag[] {
		return this.entries.map((entry): MenuFlag => ({
			kind: "toggle",
			flag: entry.resolvedFlagName(),
			description: entry.userView,
			entry,
			menu: this,
		}));
	}

	recordFlagValue(context: BuildContext, entry: MenuEntry, enabled: boolean): void {
		if (enabled) {
			recordEntry(context, entry, entry.code, true, `${entry.code}_info`);
			return;
		}
		context.set(entry.code, false);
	}
}

export function defineMultiMenu(init: MultiMenuInit): MultiSelectMenu {
	return new MultiSelectMenu(init);
}
