import { PassThrough } from "node:stream";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { createProgram, runCli } from "../cli.js";
import { DATABASES } from "../project/databases.js";
import { pickMany, ScriptedPromptDriver } from "./helpers/scriptedPromptDriver.js";

const promptMocks = vi.hoisted(() => ({
	intro: vi.fn(),
	outro: vi.fn(),
	cancel: vi.fn(),
	isCancel: (value: unknown): value is symbol => typeof value === "symbol",
	log: {
		info: vi.fn(),
		step: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	},
}));

vi.mock("@clack/prompts", () => promptMocks);

function captureStdout() {
	const stdout = new PassThrough();
	let written = "";
	stdout.on("data", (chunk: Buffer) => {
		written += chunk.toString();
	});
	return { stdout, output: () => written };
}

const argv = (...args: string[]) => ["node", "project-wizard", ...args];

describe("createProgram", () => {
	it("registers the global options and every menu flag", () => {
		const { program, bindings } = createProgram();
		const flags = program.options.map((option) => option.long);
		expect(flags).toEqual(
			expect.arrayContaining(["--name", "--no-input", "--presenter", "--database", "--no-traefik"]),
		);
		expect(bindings).toHaveLength(17);
	});
});

describe("runCli", () => {
	beforeEach(() => {
		vi.clearAllMocks();
	});

	it("fills unanswered menus with defaults when input is disabled", async () => {
		const { stdout, output } = captureStdout();

		const exitCode = await runCli(
			argv("--name", "Demo", "--database", "postgresql", "--ci", "gitlab", "--redis", "--no-input"),
			{ env: {}, stdout },
		);

		expect(exitCode).toBe(0);
		expect(JSON.parse(output())).toEqual({
			force: false,
			project_name: "demo",
			api_type: "rest",
			db: "postgresql",
			db_info: DATABASES.postgresql,
			orm: "sqlalchemy",
			ci_type: "gitlab_ci",
			enable_redis: true,
			enable_migrations: true,
			add_dummy: true,
			enable_routers: true,
		});
	});

	it("keeps a --no-<flag> toggle off when input is disabled", async () => {
		const { stdout, output } = captureStdout();

		const exitCode = await runCli(argv("--name", "demo", "--no-routers", "--no-input"), { env: {}, stdout });

		expect(exitCode).toBe(0);
		expect(JSON.parse(output())).toMatchObject({ db: "none", orm: "none", enable_routers: false });
	});

	it("only prompts for menus the flags left open", async () => {
		const { stdout, output } = captureStdout();
		const driver = new ScriptedPromptDriver([pickMany("enable_routers")]);

		const exitCode = await runCli(
			argv(
				"--name",
				"demo",
				"--force",
				"--api-type",
				"graphql",
				"--database",
				"none",
				"--ci",
				"none",
				"--no-redis",
				"--no-rmq",
				"--no-kafka",
			),
			{ env: {}, stdout, driver },
		);

		expect(exitCode).toBe(0);
		expect(driver.prompts.map((prompt) => prompt.message)).toEqual(["Additional features"]);
		expect(JSON.parse(output())).toMatchObject({
			force: true,
			api_type: "graphql",
			pydanticv1: true,
			orm: "none",
			enable_migrations: false,
			add_dummy: false,
			enable_routers: true,
		});
	});

	it("rejects an unknown menu choice", async () => {
		const exitCode = await runCli(argv("--database", "oracle", "--no-input"), { env: {} });

		expect(exitCode).toBe(1);
		expect(promptMocks.log.error).toHaveBeenCalledWith(
			'"oracle" is not a valid choice for "Database" (db). Expected one of: none, sqlite, mysql, postgresql.',
		);
	});

	it("rejects a malformed environment override", async () => {
		const exitCode = await runCli(argv("--no-input"), { env: { PROJECT_WIZARD_PRESENTER: "fancy" } });

		expect(exitCode).toBe(1);
		expect(promptMocks.log.error).toHaveBeenCalledWith(
			'PROJECT_WIZARD_PRESENTER must be one of auto, preview, dialog (received "fancy").',
		);
	});

	it("returns the commander exit code for usage errors", async () => {
		const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

		await expect(runCli(argv("--unknown-flag"), { env: {} })).resolves.toBe(1);
		await expect(runCli(argv("--presenter", "fancy"), { env: {} })).resolves.toBe(1);

		stderr.mockRestore();
	});
});
