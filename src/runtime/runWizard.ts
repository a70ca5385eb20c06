import { cancel, intro, log, outro } from "@clack/prompts";
import chalk from "chalk";

import { BuildContext, type ContextSnapshot } from "../engine/context.js";
import {
	MenuDefinitionError,
	NonInteractiveInputError,
	NoVisibleEntriesError,
	PromptCancelledError,
	UnknownEntryError,
	WizardConfigError,
	WizardError,
} from "../engine/errors.js";
import type { AnyMenu } from "../engine/menuModel.js";
import { runMenus } from "../engine/wizard.js";
import type { PromptDriver } from "./promptDriver.js";
import {
	choosePresenter,
	createPromptDriver,
	detectTerminalCapabilities,
	type PresenterPreference,
} from "./terminal.js";

export interface TextQuestion {
	key: string;
	message: string;
	placeholder?: string;
	defaultValue?: string;
	normalize?: (value: string) => string;
	validate?: (value: string) => string | undefined;
}

/** Downstream collaborator that turns the finished context into files. */
export interface ContextRenderer {
	render(context: ContextSnapshot): Promise<void> | void;
}

export interface WizardOptions {
	title?: string;
	menus: readonly AnyMenu[];
	questions?: readonly TextQuestion[];
	/** Context pre-seeded from flags or defaults. */
	context?: BuildContext;
	renderer: ContextRenderer;
	nonInteractive?: boolean;
	presenter?: PresenterPreference;
	/** Overrides presenter detection. */
	driver?: PromptDriver;
	verbose?: boolean;
}

export interface WizardRunResult {
	exitCode: number;
	context?: ContextSnapshot;
}

export async function runWizard(options: WizardOptions): Promise<WizardRunResult> {
	intro(chalk.cyan(options.title ?? "Project wizard"));

	const context = options.context ?? new BuildContext();
	const driver = options.driver ?? resolvePromptDriver(options);
	if (options.verbose) {
		log.info(`Using the ${chalk.cyan(driver.name)} presenter.`);
	}

	let snapshot: ContextSnapshot;
	try {
		await askQuestions(options.questions ?? [], context, driver);
		const outcome = await runMenus(options.menus, context, {
			driver,
			verbose: options.verbose,
		});
		if (outcome.status === "cancelled") {
			cancel(`Cancelled at "${outcome.menu}". Nothing was generated.`);
			return { exitCode: 1 };
		}
		snapshot = outcome.context.freeze();
	} catch (error) {
		if (error instanceof PromptCancelledError) {
			cancel("Cancelled. Nothing was generated.");
			return { exitCode: 1 };
		}
		const failure = error instanceof Error ? error : new Error(String(error));
		handleFatalError(failure, describeFailure(failure));
		if (failure instanceof WizardError) {
			return { exitCode: 1 };
		}
		throw error;
	}

	try {
		await options.renderer.render(snapshot);
	} catch (error) {
		handleFatalError(
			error instanceof Error ? error : new Error(String(error)),
			"Rendering failed",
		);
		return { exitCode: 1 };
	}

	outro(chalk.green("Configuration complete."));
	return { exitCode: 0, context: snapshot };
}

function resolvePromptDriver(options: WizardOptions): PromptDriver {
	if (options.nonInteractive) {
		return createPromptDriver("none");
	}
	const kind = choosePresenter(detectTerminalCapabilities(), options.presenter);
	if (kind === "none") {
		log.warn("No interactive terminal detected; unanswered menus use their defaults.");
	}
	return createPromptDriver(kind);
}

async function askQuestions(
	questions: readonly TextQuestion[],
	context: BuildContext,
	driver: PromptDriver,
): Promise<void> {
	for (const question of questions) {
		const existing = context.get(question.key);
		if (existing !== undefined) {
			const problem = typeof existing === "string" ? question.validate?.(existing) : undefined;
			if (problem) {
				throw new WizardConfigError(`Invalid ${question.key}: ${problem}`);
			}
			continue;
		}
		const normalize = question.normalize ?? ((value: string) => value.trim());
		const answer = await driver.text({
			message: question.message,
			placeholder: question.placeholder,
			defaultValue: question.defaultValue,
			validate: (value) =>
				value.trim() === "" && question.defaultValue !== undefined
					? undefined
					: question.validate?.(normalize(value)),
		});
		context.set(question.key, normalize(answer));
	}
}

function describeFailure(error: Error): string {
	if (
		error instanceof MenuDefinitionError ||
		error instanceof NoVisibleEntriesError ||
		error instanceof UnknownEntryError
	) {
		return "Menu configuration error";
	}
	if (error instanceof WizardConfigError) {
		return "Invalid configuration";
	}
	if (error instanceof NonInteractiveInputError) {
		return "Missing input";
	}
	return "Wizard failed";
}

function handleFatalError(error: Error, message: string) {
	log.error(`${message}: ${error.message}`);
	outro(chalk.red("Wizard exited with errors."));
}
