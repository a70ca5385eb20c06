export class WizardError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class PromptCancelledError extends WizardError {
	constructor(message = "Prompt cancelled by the user.") {
		super(message);
	}
}

export class NoSuchOptionError extends WizardError {
	readonly key: string;

	constructor(key: string) {
		super(`No such option: "${key}" has not been set in the build context.`);
		this.key = key;
	}
}

export class ContextTypeError extends WizardError {
	readonly key: string;

	constructor(key: string, message: string) {
		super(`Option "${key}" ${message}`);
		this.key = key;
	}
}

export class UnknownEntryError extends WizardError {
	readonly menu: string;
	readonly value: string;

	constructor(menu: string, value: string, known: readonly string[]) {
		super(
			`"${value}" is not a valid choice for ${menu}. Expected one of: ${known.join(", ")}.`,
		);
		this.menu = menu;
		this.value = value;
	}
}

export class NoVisibleEntriesError extends WizardError {
	readonly menu: string;

	constructor(menu: string) {
		super(
			`${menu} needs an answer but every entry is hidden. Add a beforeAsk resolver or pass the value as a flag.`,
		);
		this.menu = menu;
	}
}

export class MenuDefinitionError extends WizardError {}

export class NonInteractiveInputError extends WizardError {}

export class WizardConfigError extends WizardError {}
