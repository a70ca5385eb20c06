import type { PromptDriver, PromptSelection } from "../runtime/promptDriver.js";
import { PromptCancelledError } from "../runtime/promptDriver.js";
import type { BuildContext, ContextValue } from "./context.js";
import { MenuDefinitionError, NoVisibleEntriesError, UnknownEntryError } from "./errors.js";
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

export type EntryResolver = (context: BuildContext) => MenuEntry | undefined;
export type FlagParser = (raw: string) => string;

const noEntry: EntryResolver = () => undefined;
const identityParser: FlagParser = (raw) => raw;

export interface SingleMenuInit extends BaseMenuInit {
	/** Context key the chosen entry code is written to. */
	code: string;
	cliName?: string;
	/** Context key receiving the chosen entry's `additionalInfo`. Defaults to `<code>_info`. */
	infoKey?: string;
	defaultCode?: string;
	allowSkip?: boolean;
	beforeAsk?: (context: BuildContext, menu: SingleSelectMenu) => MenuEntry | undefined;
	afterAsk?: AfterAskHook<SingleSelectMenu>;
	parser?: FlagParser;
}

export class SingleSelectMenu implements MenuModel {
	readonly kind = "single";
	readonly code: string;
	readonly cliName: string | undefined;
	readonly title: string;
	readonly description: string;
	readonly entries: readonly MenuEntry[];
	readonly infoKey: string;
	readonly defaultCode: string | undefined;
	readonly allowSkip: boolean;
	private readonly beforeAsk: EntryResolver;
	private readonly afterAsk: AfterAskHook<SingleSelectMenu>;
	private readonly parser: FlagParser;

	constructor(init: SingleMenuInit) {
		if (init.code.trim().length === 0) {
			throw new MenuDefinitionError(`Menu "${init.title}" needs a non-empty context code.`);
		}
		this.code = init.code;
		this.cliName = init.cliName;
		this.title = init.title;
		this.description = init.description ?? "";
		this.entries = buildEntries(this.label, init.entries);
		this.infoKey = init.infoKey ?? `${init.code}_info`;
		this.allowSkip = init.allowSkip ?? true;
		this.afterAsk = init.afterAsk ?? keepContext;
		this.parser = init.parser ?? identityParser;
		const beforeAsk = init.beforeAsk;
		this.beforeAsk = beforeAsk ? (context) => beforeAsk(context, this) : noEntry;

		if (init.defaultCode !== undefined && !this.findEntry(init.defaultCode)) {
			throw new MenuDefinitionError(
				`${this.label} uses "${init.defaultCode}" as default, but no entry has that code.`,
			);
		}
		this.defaultCode = init.defaultCode;
	}

	get label(): string {
		return `"${this.title}" (${this.code})`;
	}

	get visitKey(): string {
		return `single:${this.code}`;
	}

	get flagName(): string {
		return this.cliName ?? this.code;
	}

	findEntry(code: string): MenuEntry | undefined {
		return this.entries.find((entry) => entry.code === code);
	}

	/**
	 * A skipped menu stays answered for the rest of the run. A stored value that
	 * names no entry still needs input, so `collectChoice` can reject it.
	 */
	needsInput(context: BuildContext): boolean {
		const current = context.get(this.code);
		if (current === undefined) {
			return !context.wasVisited(this.visitKey);
		}
		return typeof current !== "string" || !this.findEntry(current);
	}

	async collectChoice(context: BuildContext, driver: PromptDriver): Promise<ChoiceOutcome> {
		// A bad stored value is reported even when beforeAsk could answer.
		const current = context.get(this.code);
		const stored = current === undefined ? undefined : this.entryForContextValue(current);
		let chosen = this.beforeAsk(context) ?? stored;

		if (!chosen) {
			const available = visibleEntries(this.entries, context);
			if (available.length === 0) {
				throw new NoVisibleEntriesError(this.label);
			}

			let selection: PromptSelection<string>;
			try {
				selection = await driver.select({
					message: this.title,
					description: this.description,
					options: available.map((entry) => ({
						value: entry.code,
						label: entry.userView,
						hint: entry.description,
					})),
					initialValue: available.some((entry) => entry.code === this.defaultCode)
						? this.defaultCode
						: undefined,
					allowSkip: this.allowSkip,
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
			const value = selection.value;
			chosen = available.find((entry) => entry.code === value);
			if (!chosen) {
				throw new UnknownEntryError(
					this.label,
					value,
					available.map((entry) => entry.code),
				);
			}
		}

		recordEntry(context, chosen, this.code, chosen.code, this.infoKey);
		context.markVisited(this.visitKey);
		return { kind: "chosen", entries: [chosen] };
	}

	postProcess(context: BuildContext): BuildContext {
		return this.afterAsk(context, this);
	}

	flagSurface(): MenuFlag[] {
		return [
			{
				kind: "choice",
				flag: this.flagName,
				description: this.description || this.title,
				choices: this.entries.map((entry) => entry.resolvedFlagName()),
				menu: this,
			},
		];
	}

	/** Seeds the context from a CLI value, matched case-insensitively against flag names. */
	recordFlagValue(context: BuildContext, raw: string): MenuEntry {
		const wanted = this.parser(raw).trim().toLowerCase();
		const entry = this.entries.find((item) => item.resolvedFlagName().toLowerCase() === wanted);
		if (!entry) {
			throw new UnknownEntryError(
				this.label,
				raw,
				this.entries.map((item) => item.resolvedFlagName()),
			);
		}
		recordEntry(context, entry, this.code, entry.code, this.infoKey);
		return entry;
	}

	private entryForContextValue(value: ContextValue): MenuEntry {
		const entry = typeof value === "string" ? this.findEntry(value) : undefined;
		if (!entry) {
			throw new UnknownEntryError(
				this.label,
				typeof value === "string" ? value : JSON.stringify(value),
				this.entries.map((item) => item.code),
			);
		}
		return entry;
	}
}

export function defineSingleMenu(init: SingleMenuInit): SingleSelectMenu {
	return new SingleSelectMenu(init);
}
