import process from "node:process";

import { WizardConfigError } from "../engine/errors.js";
import type { PresenterPreference } from "./terminal.js";

export interface WizardSettings {
	presenter: PresenterPreference;
	nonInteractive: boolean;
}

export const PRESENTER_ENV = "PROJECT_WIZARD_PRESENTER";
export const NO_INPUT_ENV = "PROJECT_WIZARD_NO_INPUT";

const PRESENTERS: readonly PresenterPreference[] = ["auto", "preview", "dialog"];
const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["", "0", "false", "no", "off"]);

export function parsePresenterPreference(value: string, source: string): PresenterPreference {
	const normalized = value.trim().toLowerCase();
	const match = PRESENTERS.find((presenter) => presenter === normalized);
	if (!match) {
		throw new WizardConfigError(
			`${source} must be one of ${PRESENTERS.join(", ")} (received "${value}").`,
		);
	}
	return match;
}

function parseBooleanFlag(value: string | undefined, name: string): boolean {
	if (value === undefined) {
		return false;
	}
	const normalized = value.trim().toLowerCase();
	if (TRUTHY.has(normalized)) {
		return true;
	}
	if (FALSY.has(normalized)) {
		return false;
	}
	throw new WizardConfigError(`${name} must be a boolean such as 1 or 0 (received "${value}").`);
}

/**
 * Reads the environment overrides. A set `CI` variable (other than `0` or
 * `false`) disables prompting.
 */
export function loadWizardSettings(env: NodeJS.ProcessEnv = process.env): WizardSettings {
	const presenterValue = env[PRESENTER_ENV];
	return {
		presenter:
			presenterValue === undefined || presenterValue.trim() === ""
				? "auto"
				: parsePresenterPreference(presenterValue, PRESENTER_ENV),
		nonInteractive:
			parseBooleanFlag(env[NO_INPUT_ENV], NO_INPUT_ENV) ||
			(env.CI !== undefined && !FALSY.has(env.CI.trim().toLowerCase())),
	};
}
