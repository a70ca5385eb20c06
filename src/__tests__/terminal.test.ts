import { describe, expect, it } from "vitest";

import { ClackPromptDriver } from "../runtime/clackPromptDriver.js";
import { PreviewPromptDriver } from "../runtime/previewPromptDriver.js";
import { NonInteractivePromptDriver } from "../runtime/promptDriver.js";
import {
	choosePresenter,
	createPromptDriver,
	detectTerminalCapabilities,
} from "../runtime/terminal.js";
import { detectUnicodeSupport } from "../runtime/unicode.js";

const tty = { isTTY: true, columns: 100 };

describe("detectTerminalCapabilities", () => {
	it("requires both streams to be terminals", () => {
		const base = { env: { TERM: "xterm-256color" }, platform: "linux" as const };
		expect(detectTerminalCapabilities({ ...base, stdin: tty, stdout: tty })).toEqual({
			interactive: true,
			unicode: true,
			columns: 100,
		});
		expect(detectTerminalCapabilities({ ...base, stdin: {}, stdout: tty }).interactive).toBe(false);
	});

	it("treats a dumb terminal as non-interactive", () => {
		expect(
			detectTerminalCapabilities({ stdin: tty, stdout: tty, env: { TERM: "dumb" }, platform: "linux" })
				.interactive,
		).toBe(false);
	});

	it("assumes 80 columns when the width is unknown", () => {
		expect(
			detectTerminalCapabilities({ stdin: tty, stdout: { isTTY: true }, env: {}, platform: "linux" })
				.columns,
		).toBe(80);
	});
});

describe("detectUnicodeSupport", () => {
	it("follows the terminal and platform", () => {
		expect(detectUnicodeSupport({ TERM: "linux" }, "linux")).toBe(false);
		expect(detectUnicodeSupport({}, "darwin")).toBe(true);
		expect(detectUnicodeSupport({}, "win32")).toBe(false);
		expect(detectUnicodeSupport({ WT_SESSION: "1" }, "win32")).toBe(true);
	});
});

describe("choosePresenter", () => {
	it("prefers the preview list on wide unicode terminals", () => {
		expect(choosePresenter({ interactive: true, unicode: true, columns: 60 })).toBe("preview");
		expect(choosePresenter({ interactive: true, unicode: true, columns: 59 })).toBe("dialog");
		expect(choosePresenter({ interactive: true, unicode: false, columns: 120 })).toBe("dialog");
	});

	it("honours an explicit preference but never prompts without a terminal", () => {
		expect(choosePresenter({ interactive: true, unicode: false, columns: 40 }, "preview")).toBe(
			"preview",
		);
		expect(choosePresenter({ interactive: false, unicode: true, columns: 120 }, "dialog")).toBe("none");
	});
});

describe("createPromptDriver", () => {
	it("maps presenter kinds to drivers", () => {
		expect(createPromptDriver("preview")).toBeInstanceOf(PreviewPromptDriver);
		expect(createPromptDriver("dialog")).toBeInstanceOf(ClackPromptDriver);
		expect(createPromptDriver("dialog")).not.toBeInstanceOf(PreviewPromptDriver);
		expect(createPromptDriver("none")).toBeInstanceOf(NonInteractivePromptDriver);
		expect(createPromptDriver("preview").name).toBe("preview");
	});
});
