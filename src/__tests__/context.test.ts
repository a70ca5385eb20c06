import { describe, expect, it } from "vitest";

import { BuildContext } from "../engine/context.js";
import { ContextTypeError, NoSuchOptionError } from "../engine/errors.js";

describe("BuildContext", () => {
	it("skips undefined seed values", () => {
		const context = new BuildContext({ force: true, project_name: undefined });
		expect(context.keys()).toEqual(["force"]);
		expect(context.has("project_name")).toBe(false);
	});

	it("reads typed values and reports missing keys", () => {
		const context = new BuildContext({ db: "sqlite", enable_redis: true, port: 5432 });
		expect(context.string("db")).toBe("sqlite");
		expect(context.boolean("enable_redis")).toBe(true);
		expect(() => context.require("orm")).toThrow(NoSuchOptionError);
		expect(() => context.require("orm")).toThrow(
			'No such option: "orm" has not been set in the build context.',
		);
		expect(() => context.string("port")).toThrow('Option "port" holds number 5432, expected a string.');
		expect(() => context.boolean("db")).toThrow(ContextTypeError);
	});

	it("treats missing and falsy values as disabled", () => {
		const context = new BuildContext({ a: false, b: "", c: 0, d: null, e: "yes", f: 1 });
		expect(["a", "b", "c", "d", "missing"].map((key) => context.isEnabled(key))).toEqual([
			false,
			false,
			false,
			false,
			false,
		]);
		expect(context.isEnabled("e")).toBe(true);
		expect(context.isEnabled("f")).toBe(true);
	});

	it("keeps the legacy flag sticky once enabled", () => {
		const context = new BuildContext(undefined, { legacyModeKey: "pydanticv1" });
		expect(context.legacyMode).toBe(false);
		context.set("pydanticv1", false);
		context.enableLegacyMode();
		expect(context.get("pydanticv1")).toBe(true);
		expect(() => context.set("pydanticv1", false)).toThrow(
			'Option "pydanticv1" cannot be cleared once it has been enabled.',
		);
		context.set("pydanticv1", true);
		expect(context.legacyMode).toBe(true);
	});

	it("rejects a non-boolean legacy flag", () => {
		const context = new BuildContext();
		expect(() => context.set("legacy_mode", "yes")).toThrow(
			'Option "legacy_mode" must be a boolean, got string "yes".',
		);
	});

	it("freezes a deep copy", () => {
		const context = new BuildContext({ db_info: { name: "mysql", port: 3306 }, tags: ["a"] });
		const snapshot = context.freeze();
		expect(snapshot).toEqual({ db_info: { name: "mysql", port: 3306 }, tags: ["a"] });
		expect(Object.isFrozen(snapshot)).toBe(true);
		expect(Object.isFrozen(snapshot.db_info)).toBe(true);
		expect(Object.isFrozen(snapshot.tags)).toBe(true);

		context.set("db", "mysql");
		expect(snapshot).not.toHaveProperty("db");
		expect(context.size).toBe(3);
	});
});
