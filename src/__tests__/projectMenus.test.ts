import { describe, expect, it } from "vitest";

import { collectMenuOptions } from "../engine/cliOptions.js";
import type { AnyMenu } from "../engine/menuModel.js";
import { SingleSelectMenu } from "../engine/singleSelectMenu.js";
import { DATABASES } from "../project/databases.js";
import {
	createProjectMenus,
	normalizeProjectName,
	validateProjectName,
} from "../project/projectMenus.js";
import { createProjectContext } from "../runtime/scriptKit.js";

function singleMenu(menus: AnyMenu[], code: string): SingleSelectMenu {
	const menu = menus.find((item) => item instanceof SingleSelectMenu && item.code === code);
	if (!(menu instanceof SingleSelectMenu)) {
		throw new Error(`missing menu ${code}`);
	}
	return menu;
}

const visibleCodes = (menu: AnyMenu, seed: Parameters<typeof createProjectContext>[0]) => {
	const context = createProjectContext(seed);
	return menu.entries.filter((entry) => entry.isVisible(context)).map((entry) => entry.code);
};

describe("project menus", () => {
	it("exposes a flag set without collisions", () => {
		const flags = collectMenuOptions(createProjectMenus(), ["name", "force"]).map(
			(binding) => binding.flag.flag,
		);
		expect(flags.slice(0, 4)).toEqual(["api-type", "database", "orm", "ci"]);
		expect(flags).toContain("self-hosted-swagger");
		expect(flags).toHaveLength(17);
	});

	it("filters ORMs by database", () => {
		const orm = singleMenu(createProjectMenus(), "orm");
		expect(visibleCodes(orm, { db: "none" })).toEqual([]);
		expect(visibleCodes(orm, { db: "mysql" })).toEqual(["ormar", "sqlalchemy", "tortoise"]);
		expect(visibleCodes(orm, { db: "postgresql" })).toEqual([
			"ormar",
			"sqlalchemy",
			"tortoise",
			"psycopg",
			"piccolo",
		]);
	});

	it("shows taskiq only next to a broker", () => {
		const features = createProjectMenus()[5];
		if (!features) {
			throw new Error("missing features menu");
		}
		expect(visibleCodes(features, { db: "none" })).not.toContain("enable_taskiq");
		expect(visibleCodes(features, { db: "sqlite", orm: "sqlalchemy", enable_rmq: true })).toContain(
			"enable_taskiq",
		);
	});

	it("forwards database connection details under db_info", () => {
		const database = singleMenu(createProjectMenus(), "db");
		const context = createProjectContext();
		database.recordFlagValue(context, "PostgreSQL");
		expect(context.get("db")).toBe("postgresql");
		expect(context.get("db_info")).toEqual(DATABASES.postgresql);
		expect(DATABASES.postgresql.driver_short).toBe("postgres");
	});

	it("marks graphql projects as legacy", () => {
		const api = singleMenu(createProjectMenus(), "api_type");
		const context = createProjectContext();
		api.recordFlagValue(context, "graphql");
		expect(context.get("pydanticv1")).toBe(true);
	});

	it("disables migrations and the dummy model without an ORM", () => {
		const orm = singleMenu(createProjectMenus(), "orm");
		const context = orm.postProcess(createProjectContext({ db: "none", orm: "none", add_dummy: true }));
		expect(context.get("enable_migrations")).toBe(false);
		expect(context.get("add_dummy")).toBe(true);
	});
});

describe("project name", () => {
	it("normalizes separators and case", () => {
		expect(normalizeProjectName("  My Service-API ")).toBe("my_service_api");
	});

	it("validates the normalized name", () => {
		expect(validateProjectName("my_service")).toBeUndefined();
		expect(validateProjectName("1service")).toBe(
			"must start with a letter and contain only letters, digits and underscores.",
		);
	});
});
