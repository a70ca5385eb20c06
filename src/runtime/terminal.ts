import process from "node:process";

import { ClackPromptDriver } from "./clackPromptDriver.js";
import { NonInteractivePromptDriver, type PromptDriver } from "./promptDriver.js";
import { PreviewPromptDriver } from "./previewPromptDriver.js";
import { detectUnicodeSupport } from "./unicode.js";

export type PresenterKind = "preview" | "dialog" | "none";
export type PresenterPreference = "auto" | "preview" | "dialog";

export interface TerminalCapabilities {
	interactive: boolean;
	unicode: boolean;
	columns: number;
}

interface StreamLike {
	isTTY?: boolean;
	columns?: number;
}

/** Narrowest terminal that still fits the list beside its preview pane. */
export const MIN_PREVIEW_COLUMNS = 60;

export function detectTerminalCapabilities(options?: {
	stdin?: StreamLike;
	stdout?: StreamLike;
	env?: NodeJS.ProcessEnv;
	platform?: NodeJS.Platform;
}): TerminalCapabilities {
	const stdin = options?.stdin ?? process.stdin;
	const stdout = options?.stdout ?? process.stdout;
	const env = options?.env ?? process.env;
	return {
		interactive: Boolean(stdin.isTTY && stdout.isTTY) && env.TERM !== "dumb",
		unicode: detectUnicodeSupport(env, options?.platform ?? process.platform),
		columns: stdout.columns ?? 80,
	};
}

export function choosePresenter(
	capabilities: TerminalCapabilities,
	preference: PresenterPreference = "auto",
): PresenterKind {
	if (!capabilities.interactive) {
		return "none";
	}
	if (preference !== "auto") {
		return preference;
	}
	return capabilities.unicode && capabilities.columns >= MIN_PREVIEW_COLUMNS
		? "preview"
		: "dialog";
}

export function createPromptDriver(kind: PresenterKind): PromptDriver {
	switch (kind) {
		case "preview":
			return new PreviewPromptDriver();
		case "dialog":
			return new ClackPromptDriver();
		default:
			return new NonInteractivePromptDriver();
	}
}
