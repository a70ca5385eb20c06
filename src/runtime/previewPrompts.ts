import { isCancel, MultiSelectPrompt, SelectPrompt } from "@clack/core";
import process from "node:process";
import pc from "picocolors";

import type { PromptOption, PromptSelection } from "./promptDriver.js";
import { detectUnicodeSupport } from "./unicode.js";

export const SKIP_KEY = "s";

export interface PreviewSelectOptions<Value extends string> {
	message: string;
	options: Array<PromptOption<Value>>;
	initialValue?: Value;
	maxItems?: number;
	allowSkip?: boolean;
	previewTitle?: string;
	columns?: number;
}

export interface PreviewMultiselectOptions<Value extends string> {
	message: string;
	options: Array<PromptOption<Value>>;
	initialValues?: Value[];
	maxItems?: number;
	allowSkip?: boolean;
	previewTitle?: string;
	columns?: number;
}

type PromptState = "initial" | "active" | "cancel" | "submit" | "error";

const unicodeSupported = detectUnicodeSupport();
const pickUnicode = (unicode: string, fallback: string) =>
	unicodeSupported ? unicode : fallback;

const ICON_PRIMARY = pickUnicode("◆", "*");
const ICON_WARN = pickUnicode("■", "x");
const ICON_ERROR = pickUnicode("▲", "x");
const ICON_SUCCESS = pickUnicode("◇", "o");
const FRAME_SIDE = pickUnicode("│", "|");
const FRAME_BOTTOM = pickUnicode("└", "—");
const OPTION_ACTIVE = pickUnicode("●", ">");
const OPTION_INACTIVE = pickUnicode("○", " ");
const CHECKBOX_ON = pickUnicode("◼", "[+]");
const CHECKBOX_OFF = pickUnicode("◻", "[ ]");

function formatStateIcon(state: PromptState): string {
	switch (state) {
		case "cancel":
			return pc.red(ICON_WARN);
		case "submit":
			return pc.green(ICON_SUCCESS);
		case "error":
			return pc.yellow(ICON_ERROR);
		default:
			return pc.cyan(ICON_PRIMARY);
	}
}

function formatOption<Value extends string>(
	option: PromptOption<Value>,
	state: "active" | "inactive" | "selected" | "cancelled",
): string {
	switch (state) {
		case "active":
			return `${pc.green(OPTION_ACTIVE)} ${option.label}`;
		case "selected":
			return pc.dim(option.label);
		case "cancelled":
			return pc.strikethrough(pc.dim(option.label));
		default:
			return `${pc.dim(OPTION_INACTIVE)} ${pc.dim(option.label)}`;
	}
}

function formatCheckbox<Value extends string>(
	option: PromptOption<Value>,
	checked: boolean,
	active: boolean,
): string {
	const box = checked ? pc.green(CHECKBOX_ON) : pc.dim(CHECKBOX_OFF);
	const label = active ? option.label : pc.dim(option.label);
	return `${active && !checked ? pc.cyan(CHECKBOX_OFF) : box} ${label}`;
}

/** Greedy word wrap; words longer than the width are kept whole. */
export function wrapText(text: string, width: number): string[] {
	const lines: string[] = [];
	for (const paragraph of text.split("\n")) {
		let line = "";
		for (const word of paragraph.split(/\s+/).filter(Boolean)) {
			if (line.length === 0) {
				line = word;
			} else if (line.length + 1 + word.length <= width) {
				line = `${line} ${word}`;
			} else {
				lines.push(line);
				line = word;
			}
		}
		lines.push(line);
	}
	return lines;
}

export function renderPreviewPane(options: {
	title: string;
	text: string | undefined;
	columns: number;
}): string {
	const width = Math.max(options.columns - 6, 20);
	const body = wrapText(options.text ?? "", width).map(
		(line) => `${pc.cyan(FRAME_SIDE)}  ${pc.dim(line)}`,
	);
	return [`${pc.cyan(FRAME_SIDE)}`, `${pc.cyan(FRAME_SIDE)}  ${pc.bold(options.title)}`, ...body].join(
		"\n",
	);
}

function renderFooter(allowSkip: boolean, multiple: boolean): string {
	const keys = [
		"↑/↓ move",
		multiple ? "space toggle" : undefined,
		"enter confirm",
		allowSkip ? `${SKIP_KEY} skip` : undefined,
		"ctrl+c cancel",
	].filter((key): key is string => key !== undefined);
	return `${pc.cyan(FRAME_BOTTOM)}  ${pc.dim(keys.join(" · "))}`;
}

/**
 * Keeps the cursor inside a scrolling window of `pageSize` rows. Returns the
 * new window start.
 */
export function scrollWindow(
	cursor: number,
	windowStart: number,
	pageSize: number,
	total: number,
): number {
	if (cursor >= windowStart + pageSize - 3) {
		return Math.max(Math.min(cursor - pageSize + 3, total - pageSize), 0);
	}
	if (cursor < windowStart + 2) {
		return Math.max(cursor - 2, 0);
	}
	return windowStart;
}

function renderWindow<Option>(
	options: readonly Option[],
	windowStart: number,
	pageSize: number,
	renderRow: (option: Option, index: number) => string,
): string {
	const hasWindow = pageSize < options.length;
	const showAbove = hasWindow && windowStart > 0;
	const showBelow = hasWindow && windowStart + pageSize < options.length;
	return options
		.slice(windowStart, windowStart + pageSize)
		.map((option, index, array) => {
			if (index === 0 && showAbove) {
				return pc.dim("...");
			}
			if (index === array.length - 1 && showBelow) {
				return pc.dim("...");
			}
			return renderRow(option, index + windowStart);
		})
		.join(`\n${pc.cyan(FRAME_SIDE)}  `);
}

export async function selectWithPreview<Value extends string>({
	message,
	options,
	initialValue,
	maxItems,
	allowSkip = false,
	previewTitle = "Description",
	columns = process.stdout.columns ?? 80,
}: PreviewSelectOptions<Value>): Promise<PromptSelection<Value> | symbol> {
	let windowStart = 0;
	let skipRequested = false;
	const pageSize = typeof maxItems === "number" ? Math.max(maxItems, 5) : Infinity;

	const prompt = new SelectPrompt<PromptOption<Value>>({
		options,
		initialValue,
		render() {
			const header = `${pc.gray(FRAME_SIDE)}\n${formatStateIcon(this.state)}  ${message}\n`;
			const current = this.options[this.cursor];

			if (this.state === "submit") {
				const summary = skipRequested || !current ? pc.dim("skipped") : formatOption(current, "selected");
				return `${header}${pc.gray(FRAME_SIDE)}  ${summary}`;
			}

			if (this.state === "cancel") {
				const summary = current ? formatOption(current, "cancelled") : "";
				return `${header}${pc.gray(FRAME_SIDE)}  ${summary}\n${pc.gray(FRAME_SIDE)}`;
			}

			windowStart = scrollWindow(this.cursor, windowStart, pageSize, this.options.length);
			const list = renderWindow(this.options, windowStart, pageSize, (option, index) =>
				formatOption(option, index === this.cursor ? "active" : "inactive"),
			);
			const preview = renderPreviewPane({ title: previewTitle, text: current?.hint, columns });

			return `${header}${pc.cyan(FRAME_SIDE)}  ${list}\n${preview}\n${renderFooter(allowSkip, false)}`;
		},
	});

	if (allowSkip) {
		prompt.on("key", (keyValue?: string) => {
			// @clack/core emits "key" before its own submit check, then finalizes,
			// renders the summary and closes the prompt once state is "submit".
			if (keyValue === SKIP_KEY && prompt.state !== "submit") {
				skipRequested = true;
				prompt.state = "submit";
			}
		});
	}

	const result: unknown = await prompt.prompt();
	if (isCancel(result)) {
		return result;
	}
	if (skipRequested) {
		return { kind: "skipped" };
	}
	const chosen = options.find((option) => option.value === result);
	if (!chosen) {
		throw new Error(`Select prompt returned an unknown value: ${String(result)}`);
	}
	return { kind: "selected", value: chosen.value };
}

export async function multiselectWithPreview<Value extends string>({
	message,
	options,
	initialValues,
	maxItems,
	allowSkip = false,
	previewTitle = "Description",
	columns = process.stdout.columns ?? 80,
}: PreviewMultiselectOptions<Value>): Promise<PromptSelection<Value[]> | symbol> {
	let windowStart = 0;
	let skipRequested = false;
	const pageSize = typeof maxItems === "number" ? Math.max(maxItems, 5) : Infinity;
	const selectedValues = (value: unknown): Set<string> =>
		new Set(Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : []);

	const prompt = new MultiSelectPrompt<PromptOption<Value>>({
		options,
		initialValues,
		render() {
			const header = `${pc.gray(FRAME_SIDE)}\n${formatStateIcon(this.state)}  ${message}\n`;
			const checked = selectedValues(this.value);

			if (this.state === "submit") {
				const labels = this.options
					.filter((option) => checked.has(option.value))
					.map((option) => option.label);
				const summary = skipRequested
					? "skipped"
					: labels.length > 0
						? labels.join(", ")
						: "none";
				return `${header}${pc.gray(FRAME_SIDE)}  ${pc.dim(summary)}`;
			}

			if (this.state === "cancel") {
				return `${header}${pc.gray(FRAME_SIDE)}  ${pc.strikethrough(pc.dim("cancelled"))}\n${pc.gray(FRAME_SIDE)}`;
			}

			windowStart = scrollWindow(this.cursor, windowStart, pageSize, this.options.length);
			const list = renderWindow(this.options, windowStart, pageSize, (option, index) =>
				formatCheckbox(option, checked.has(option.value), index === this.cursor),
			);
			const preview = renderPreviewPane({
				title: previewTitle,
				text: this.options[this.cursor]?.hint,
				columns,
			});

			return `${header}${pc.cyan(FRAME_SIDE)}  ${list}\n${preview}\n${renderFooter(allowSkip, true)}`;
		},
	});

	if (allowSkip) {
		prompt.on("key", (keyValue?: string) => {
			// @clack/core emits "key" before its own submit check, then finalizes,
			// renders the summary and closes the prompt once state is "submit".
			if (keyValue === SKIP_KEY && prompt.state !== "submit") {
				skipRequested = true;
				prompt.state = "submit";
			}
		});
	}

	const result: unknown = await prompt.prompt();
	if (isCancel(result)) {
		return result;
	}
	if (skipRequested) {
		return { kind: "skipped" };
	}
	const picked = selectedValues(result);
	return {
		kind: "selected",
		value: options.filter((option) => picked.has(option.value)).map((option) => option.value),
	};
}
