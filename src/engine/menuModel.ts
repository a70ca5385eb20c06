import type { PromptDriver } from "../runtime/promptDriver.js";
import type { BuildContext, ContextValue } from "./context.js";
import { MenuDefinitionError } from "./errors.js";
import { MenuEntry, type MenuEntryInit } from "./menuEntry.js";
import type { MultiSelectMenu } from "./multiSelectMenu.js";
import type { SingleSelectMenu } from "./singleSelectMenu.js";

export type ChoiceOutcome =
	| { kind: "chosen"; entries: readonly MenuEntry[] }
	| { kind: "skipped" }
	| { kind: "cancelled" };

export type MenuFlag =
	| {
			kind: "choice";
			flag: string;
			description: string;
			choices: readonly string[];
			menu: SingleSelectMenu;
	  }
	| {
			kind: "toggle";
			flag: string;
			description: string;
			entry: MenuEntry;
			menu: MultiSelectMenu;
	  };

/** Capability shared by both menu variants; the wizard driver only talks to this. */
export interface MenuModel {
	readonly kind: "single" | "multi";
	readonly title: string;
	readonly description: string;
	readonly entries: readonly MenuEntry[];
	needsInput(context: BuildContext): boolean;
	collectChoice(context: BuildContext, driver: PromptDriver): Promise<ChoiceOutcome>;
	postProcess(context: BuildContext): BuildContext;
	flagSurface(): MenuFlag[];
}

export type AnyMenu = SingleSelectMenu | MultiSelectMenu;

export type AfterAskHook<Menu> = (context: BuildContext, menu: Menu) => BuildContext;

export const keepContext = <Menu>(context: BuildContext, _menu: Menu): BuildContext => context;

export interface BaseMenuInit {
	title: string;
	description?: string;
	entries: ReadonlyArray<MenuEntry | MenuEntryInit>;
}

export function buildEntries(
	owner: string,
	entries: ReadonlyArray<MenuEntry | MenuEntryInit>,
): readonly MenuEntry[] {
	if (entries.length === 0) {
		throw new MenuDefinitionError(`${owner} must declare at least one entry.`);
	}
	const codes = new Set<string>();
	const flags = new Set<string>();
	// Entries are copied so that no instance is shared between two menus.
	const owned = entries.map((entry) => new MenuEntry(entry));
	for (const entry of owned) {
		if (codes.has(entry.code)) {
			throw new MenuDefinitionError(`${owner} declares the entry code "${entry.code}" twice.`);
		}
		codes.add(entry.code);
		const flag = entry.resolvedFlagName().toLowerCase();
		if (flags.has(flag)) {
			throw new MenuDefinitionError(`${owner} declares the flag name "${flag}" twice.`);
		}
		flags.add(flag);
	}
	return Object.freeze(owned);
}

/** Writes a chosen entry into the context, forwarding its payload and legacy flag. */
export function recordEntry(
	context: BuildContext,
	entry: MenuEntry,
	key: string,
	value: ContextValue,
	infoKey: string,
): void {
	context.set(key, value);
	if (entry.additionalInfo !== undefined) {
		context.set(infoKey, entry.additionalInfo);
	}
	if (entry.legacyMode) {
		context.enableLegacyMode();
	}
}
