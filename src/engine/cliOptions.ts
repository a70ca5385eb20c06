import { Option } from "commander";

import type { BuildContext } from "./context.js";
import { MenuDefinitionError } from "./errors.js";
import type { AnyMenu, MenuFlag } from "./menuModel.js";

export interface MenuOptionBinding {
	flag: MenuFlag;
	/** Commander options registered for the flag (`--x`, plus `--no-x` for toggles). */
	options: Option[];
	/** Key under which commander stores the parsed value. */
	attribute: string;
}

const FLAG_NAME_PATTERN = /^[a-z][a-z0-9_-]*$/i;

/**
 * Aggregates the flag surface of every menu into commander options.
 * `reserved` lists flag names already used by the host program.
 */
export function collectMenuOptions(
	menus: readonly AnyMenu[],
	reserved: readonly string[] = [],
): MenuOptionBinding[] {
	const owners = new Map<string, string>();
	for (const name of reserved) {
		owners.set(name.toLowerCase(), "the command line");
	}

	const claim = (name: string, owner: string) => {
		const key = name.toLowerCase();
		const existing = owners.get(key);
		if (existing) {
			throw new MenuDefinitionError(
				`Flag --${name} of ${owner} is already used by ${existing}.`,
			);
		}
		owners.set(key, owner);
	};

	const bindings: MenuOptionBinding[] = [];
	for (const menu of menus) {
		for (const flag of menu.flagSurface()) {
			if (!FLAG_NAME_PATTERN.test(flag.flag)) {
				throw new MenuDefinitionError(`${menu.label} exposes an invalid flag name "${flag.flag}".`);
			}
			claim(flag.flag, menu.label);

			if (flag.kind === "choice") {
				const option = new Option(
					`--${flag.flag} <choice>`,
					`${flag.description} (${flag.choices.join(", ")})`,
				);
				bindings.push({ flag, options: [option], attribute: option.attributeName() });
				continue;
			}

			claim(`no-${flag.flag}`, menu.label);
			const enable = new Option(`--${flag.flag}`, flag.description);
			const disable = new Option(`--no-${flag.flag}`, `Do not use: ${flag.description}`);
			bindings.push({ flag, options: [enable, disable], attribute: enable.attributeName() });
		}
	}
	return bindings;
}

/**
 * Writes the parsed flag values into the context. Flags the user did not pass
 * leave their keys absent so the matching menu is still asked.
 */
export function seedContextFromOptions(
	bindings: readonly MenuOptionBinding[],
	values: Readonly<Record<string, unknown>>,
	context: BuildContext,
): BuildContext {
	for (const binding of bindings) {
		const value = values[binding.attribute];
		if (value === undefined) {
			continue;
		}
		const { flag } = binding;
		if (flag.kind === "choice") {
			if (typeof value === "string") {
				flag.menu.recordFlagValue(context, value);
			}
			continue;
		}
		if (typeof value === "boolean") {
			flag.menu.recordFlagValue(context, flag.entry, value);
		}
	}
	return context;
}
