import { log } from "@clack/prompts";

import type { PromptDriver } from "../runtime/promptDriver.js";
import type { BuildContext } from "./context.js";
import type { MenuModel } from "./menuModel.js";

export interface RunMenusOptions {
	driver: PromptDriver;
	verbose?: boolean;
}

export type MenuPassOutcome =
	| {
			status: "completed";
			context: BuildContext;
			/** Titles of the menus that still needed input, in order. */
			visited: string[];
	  }
	| { status: "cancelled"; menu: string };

/**
 * Walks the menus once, in declared order. A menu may only depend on keys set
 * by menus listed before it: nothing is reordered or asked twice.
 */
export async function runMenus(
	menus: readonly MenuModel[],
	initialContext: BuildContext,
	options: RunMenusOptions,
): Promise<MenuPassOutcome> {
	let context = initialContext;
	const visited: string[] = [];

	for (const menu of menus) {
		if (!menu.needsInput(context)) {
			if (options.verbose) {
				log.step(`${menu.title}: already answered.`);
			}
			continue;
		}

		const outcome = await menu.collectChoice(context, options.driver);
		if (outcome.kind === "cancelled") {
			return { status: "cancelled", menu: menu.title };
		}
		visited.push(menu.title);
		if (options.verbose && outcome.kind === "skipped") {
			log.step(`${menu.title}: skipped.`);
		}
		context = menu.postProcess(context);
	}

	return { status: "completed", context, visited };
}
