import { describe, expect, it } from "vitest";

import { BuildContext } from "../engine/context.js";
import { menuEntry, visibleEntries } from "../engine/menuEntry.js";

describe("menuEntry", () => {
	it("falls back to the code for its flag name", () => {
		expect(menuEntry({ code: "github", userView: "GitHub", description: "" }).resolvedFlagName()).toBe(
			"github",
		);
		expect(
			menuEntry({
				code: "gitlab_ci",
				cliName: "gitlab",
				userView: "GitLab",
				description: "",
			}).resolvedFlagName(),
		).toBe("gitlab");
	});

	it("defaults to visible and not legacy", () => {
		const entry = menuEntry({ code: "rest", userView: "REST", description: "" });
		expect(entry.isVisible(new BuildContext())).toBe(true);
		expect(entry.legacyMode).toBe(false);
		expect(entry.additionalInfo).toBeUndefined();
	});

	it("evaluates visibility against the current context", () => {
		const entries = [
			menuEntry({ code: "always", userView: "Always", description: "" }),
			menuEntry({
				code: "with_db",
				userView: "With database",
				description: "",
				isHidden: (context) => context.get("db") === "none",
			}),
		];
		expect(visibleEntries(entries, new BuildContext({ db: "none" })).map((entry) => entry.code)).toEqual([
			"always",
		]);
		expect(
			visibleEntries(entries, new BuildContext({ db: "sqlite" })).map((entry) => entry.code),
		).toEqual(["always", "with_db"]);
	});
});
