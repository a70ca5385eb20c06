import { log } from "@clack/prompts";
import { Command, CommanderError, Option } from "commander";
import { readFileSync } from "node:fs";
import process from "node:process";

import {
	collectMenuOptions,
	type MenuOptionBinding,
	seedContextFromOptions,
} from "./engine/cliOptions.js";
import { WizardError } from "./engine/errors.js";
import type { AnyMenu } from "./engine/menuModel.js";
import { createJsonRenderer } from "./project/jsonRenderer.js";
import { createProjectMenus, normalizeProjectName } from "./project/projectMenus.js";
import { loadWizardSettings, parsePresenterPreference } from "./runtime/config.js";
import type { PromptDriver } from "./runtime/promptDriver.js";
import { createProjectContext, runProjectWizard } from "./runtime/scriptKit.js";

const RESERVED_FLAGS = [
	"name",
	"force",
	"input",
	"no-input",
	"presenter",
	"output",
	"verbose",
	"version",
	"help",
];

export interface CliIo {
	env?: NodeJS.ProcessEnv;
	stdout?: NodeJS.WritableStream;
	/** Replaces the detected presenter; used by tests. */
	driver?: PromptDriver;
}

type GlobalOptions = {
	name?: string;
	force?: boolean;
	input?: boolean;
	presenter?: string;
	output?: string;
	verbose?: boolean;
};

function readPackageVersion(): string {
	const parsed: unknown = JSON.parse(
		readFileSync(new URL("../package.json", import.meta.url), "utf8"),
	);
	if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
		return typeof parsed.version === "string" ? parsed.version : "0.0.0";
	}
	return "0.0.0";
}

export interface WizardProgram {
	program: Command;
	menus: readonly AnyMenu[];
	bindings: MenuOptionBinding[];
}

export function createProgram(menus: readonly AnyMenu[] = createProjectMenus()): WizardProgram {
	const bindings = collectMenuOptions(menus, RESERVED_FLAGS);
	const program = new Command();
	program
		.name("project-wizard")
		.description("Collect the configuration of a new service project and print it as JSON.")
		.version(readPackageVersion())
		.showHelpAfterError()
		.showSuggestionAfterError()
		.exitOverride()
		.option("--name <project_name>", "Project name")
		.option("--force", "Overwrite an existing project directory", false)
		.option("--no-input", "Never prompt; unanswered menus use their defaults")
		.addOption(
			new Option("--presenter <kind>", "Menu presentation").choices(["auto", "preview", "dialog"]),
		)
		.option("--output <file>", "Write the build context to a file instead of stdout")
		.option("--verbose", "Explain how each menu was resolved", false);

	for (const binding of bindings) {
		for (const option of binding.options) {
			program.addOption(option);
		}
	}
	return { program, menus, bindings };
}

export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
	const { program, menus, bindings } = createProgram();

	try {
		await program.parseAsync(argv);
	} catch (err) {
		if (err instanceof CommanderError) {
			return err.exitCode;
		}
		throw err;
	}

	const values = program.opts<Record<string, unknown>>();
	const flags = program.opts<GlobalOptions>();

	try {
		const settings = loadWizardSettings(io.env ?? process.env);
		const context = createProjectContext({ force: flags.force === true });
		seedContextFromOptions(bindings, values, context);
		if (flags.name !== undefined) {
			context.set("project_name", normalizeProjectName(flags.name));
		}

		const result = await runProjectWizard({
			menus,
			context,
			renderer: createJsonRenderer({ outputPath: flags.output, stdout: io.stdout }),
			nonInteractive: flags.input === false || settings.nonInteractive,
			presenter:
				flags.presenter === undefined
					? settings.presenter
					: parsePresenterPreference(flags.presenter, "--presenter"),
			verbose: flags.verbose === true,
			driver: io.driver,
		});
		return result.exitCode;
	} catch (error) {
		if (error instanceof WizardError) {
			log.error(error.message);
			return 1;
		}
		throw error;
	}
}
