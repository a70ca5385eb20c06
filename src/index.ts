export { BuildContext, DEFAULT_LEGACY_MODE_KEY } from "./engine/context.js";
export type { BuildContextOptions, ContextSnapshot, ContextValue } from "./engine/context.js";
export {
	ContextTypeError,
	MenuDefinitionError,
	NonInteractiveInputError,
	NoSuchOptionError,
	NoVisibleEntriesError,
	PromptCancelledError,
	UnknownEntryError,
	WizardConfigError,
	WizardError,
} from "./engine/errors.js";
export { MenuEntry, menuEntry, neverHidden, visibleEntries } from "./engine/menuEntry.js";
export type { EntryVisibility, MenuEntryInit } from "./engine/menuEntry.js";
export type { AnyMenu, ChoiceOutcome, MenuFlag, MenuModel } from "./engine/menuModel.js";
export { defineSingleMenu, SingleSelectMenu } from "./engine/singleSelectMenu.js";
export type { SingleMenuInit } from "./engine/singleSelectMenu.js";
export { defineMultiMenu, MultiSelectMenu } from "./engine/multiSelectMenu.js";
export type { MultiMenuInit } from "./engine/multiSelectMenu.js";
export { runMenus } from "./engine/wizard.js";
export type { MenuPassOutcome, RunMenusOptions } from "./engine/wizard.js";
export { collectMenuOptions, seedContextFromOptions } from "./engine/cliOptions.js";
export type { MenuOptionBinding } from "./engine/cliOptions.js";
export { NonInteractivePromptDriver } from "./runtime/promptDriver.js";
export type { PromptDriver, PromptOption, PromptSelection } from "./runtime/promptDriver.js";
export { ClackPromptDriver } from "./runtime/clackPromptDriver.js";
export { PreviewPromptDriver } from "./runtime/previewPromptDriver.js";
export {
	choosePresenter,
	createPromptDriver,
	detectTerminalCapabilities,
} from "./runtime/terminal.js";
export type { PresenterKind, PresenterPreference, TerminalCapabilities } from "./runtime/terminal.js";
export { loadWizardSettings } from "./runtime/config.js";
export { runWizard } from "./runtime/runWizard.js";
export type { ContextRenderer, TextQuestion, WizardOptions, WizardRunResult } from "./runtime/runWizard.js";
export { createProjectContext, runProjectWizard } from "./runtime/scriptKit.js";
export { createProjectMenus, LEGACY_MODE_KEY } from "./project/projectMenus.js";
export { createJsonRenderer } from "./project/jsonRenderer.js";
