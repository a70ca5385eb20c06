import type { BuildContext, ContextValue } from "./context.js";

export type EntryVisibility = (context: BuildContext) => boolean;

export const neverHidden: EntryVisibility = () => false;

export interface MenuEntryInit {
	code: string;
	cliName?: string;
	userView: string;
	description: string;
	isHidden?: EntryVisibility;
	additionalInfo?: ContextValue;
	legacyMode?: boolean;
}

export class MenuEntry {
	readonly code: string;
	readonly cliName: string | undefined;
	readonly userView: string;
	readonly description: string;
	readonly isHidden: EntryVisibility;
	readonly additionalInfo: ContextValue | undefined;
	readonly legacyMode: boolean;

	constructor(init: MenuEntryInit) {
		this.code = init.code;
		this.cliName = init.cliName;
		this.userView = init.userView;
		this.description = init.description;
		this.isHidden = init.isHidden ?? neverHidden;
		this.additionalInfo = init.additionalInfo;
		this.legacyMode = init.legacyMode ?? false;
	}

	resolvedFlagName(): string {
		return this.cliName ?? this.code;
	}

	isVisible(context: BuildContext): boolean {
		return !this.isHidden(context);
	}
}

export function menuEntry(init: MenuEntryInit): MenuEntry {
	return new MenuEntry(init);
}

export function visibleEntries(
	entries: readonly MenuEntry[],
	context: BuildContext,
): MenuEntry[] {
	return entries.filter((entry) => entry.isVisible(context));
}
