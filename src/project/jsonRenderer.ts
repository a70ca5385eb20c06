import { writeFile } from "node:fs/promises";
import process from "node:process";

import type { ContextSnapshot } from "../engine/context.js";
import type { ContextRenderer } from "../runtime/runWizard.js";

export interface JsonRendererOptions {
	/** File to write; the context goes to `stdout` when omitted. */
	outputPath?: string;
	stdout?: NodeJS.WritableStream;
}

export function formatContext(context: ContextSnapshot): string {
	return `${JSON.stringify(context, null, 2)}\n`;
}

/** Hands the finished context to an external template renderer as JSON. */
export function createJsonRenderer(options: JsonRendererOptions = {}): ContextRenderer {
	return {
		async render(context) {
			const payload = formatContext(context);
			if (options.outputPath) {
				await writeFile(options.outputPath, payload, "utf8");
				return;
			}
			(options.stdout ?? process.stdout).write(payload);
		},
	};
}
