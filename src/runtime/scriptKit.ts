import { BuildContext, type ContextValue } from "../engine/context.js";
import type { AnyMenu } from "../engine/menuModel.js";
import { createProjectMenus, LEGACY_MODE_KEY, projectNameQuestion } from "../project/projectMenus.js";
import { runWizard, type WizardOptions, type WizardRunResult } from "./runWizard.js";

export interface ProjectWizardOptions
	extends Omit<WizardOptions, "title" | "menus" | "questions" | "context"> {
	menus?: readonly AnyMenu[];
	/** Context already seeded from flags; takes precedence over `seed`. */
	context?: BuildContext;
	seed?: Readonly<Record<string, ContextValue | undefined>>;
}

export function createProjectContext(
	seed?: Readonly<Record<string, ContextValue | undefined>>,
): BuildContext {
	return new BuildContext(seed, { legacyModeKey: LEGACY_MODE_KEY });
}

export async function runProjectWizard(options: ProjectWizardOptions): Promise<WizardRunResult> {
	const { menus, context, seed, ...rest } = options;
	return runWizard({
		...rest,
		title: "Project wizard",
		menus: menus ?? createProjectMenus(),
		questions: [projectNameQuestion],
		context: context ?? createProjectContext(seed),
	});
}
