import type { BuildContext } from "../engine/context.js";
import type { AnyMenu } from "../engine/menuModel.js";
import { defineMultiMenu } from "../engine/multiSelectMenu.js";
import { defineSingleMenu } from "../engine/singleSelectMenu.js";
import type { TextQuestion } from "../runtime/runWizard.js";
import { DATABASES } from "./databases.js";

/** Templates switch to the Pydantic v1 code paths when this key is true. */
export const LEGACY_MODE_KEY = "pydanticv1";

const PROJECT_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export function normalizeProjectName(raw: string): string {
	return raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

export function validateProjectName(name: string): string | undefined {
	if (!PROJECT_NAME_PATTERN.test(name)) {
		return "must start with a letter and contain only letters, digits and underscores.";
	}
	return undefined;
}

export const projectNameQuestion: TextQuestion = {
	key: "project_name",
	message: "Project name",
	placeholder: "my_service",
	normalize: normalizeProjectName,
	validate: validateProjectName,
};

function withoutDatabase(context: BuildContext): boolean {
	const db = context.get("db");
	return db === undefined || db === "none";
}

function withoutOrm(context: BuildContext): boolean {
	const orm = context.get("orm");
	return withoutDatabase(context) || orm === undefined || orm === "none";
}

/**
 * Menus of the service generator, in the order they are asked. Later menus read
 * keys written by earlier ones, so the order must not change.
 */
export function createProjectMenus(): AnyMenu[] {
	const apiType = defineSingleMenu({
		code: "api_type",
		cliName: "api-type",
		title: "API type",
		description: "How clients talk to the service.",
		defaultCode: "rest",
		entries: [
			{
				code: "rest",
				userView: "REST API",
				description: "Routers with request and response models, documented through OpenAPI.",
			},
			{
				code: "graphql",
				userView: "GraphQL API",
				description:
					"A Strawberry schema with queries and mutations. GraphQL projects use Pydantic v1.",
				legacyMode: true,
			},
			{
				code: "none",
				userView: "Without API",
				description: "A bare application with only the health-check endpoint.",
			},
		],
	});

	const database = defineSingleMenu({
		code: "db",
		cliName: "database",
		title: "Database",
		description: "Database the service connects to.",
		infoKey: "db_info",
		defaultCode: "none",
		entries: [
			{
				code: "none",
				userView: "No database",
				description: "The service does not store anything.",
				additionalInfo: DATABASES.none,
			},
			{
				code: "sqlite",
				userView: "SQLite",
				description: "A file-based database, handy for prototypes and small deployments.",
				additionalInfo: DATABASES.sqlite,
			},
			{
				code: "mysql",
				userView: "MySQL",
				description: "MySQL 8 running in its own container.",
				additionalInfo: DATABASES.mysql,
			},
			{
				code: "postgresql",
				userView: "PostgreSQL",
				description: "PostgreSQL 16 running in its own container.",
				additionalInfo: DATABASES.postgresql,
			},
		],
	});

	const orm = defineSingleMenu({
		code: "orm",
		title: "ORM",
		description: "Library used to talk to the database.",
		defaultCode: "sqlalchemy",
		beforeAsk: (context, menu) => (withoutDatabase(context) ? menu.findEntry("none") : undefined),
		afterAsk: (context) => {
			if (withoutOrm(context)) {
				for (const key of ["enable_migrations", "add_dummy"]) {
					if (!context.has(key)) {
						context.set(key, false);
					}
				}
			}
			return context;
		},
		entries: [
			{
				code: "none",
				userView: "Without ORM",
				description: "No data layer is generated.",
				isHidden: () => true,
			},
			{
				code: "ormar",
				userView: "Ormar",
				description: "Async ORM built on SQLAlchemy core and Pydantic v1 models.",
				isHidden: withoutDatabase,
				legacyMode: true,
			},
			{
				code: "sqlalchemy",
				userView: "SQLAlchemy",
				description: "SQLAlchemy 2 with its asyncio extension and Alembic migrations.",
				isHidden: withoutDatabase,
			},
			{
				code: "tortoise",
				userView: "Tortoise ORM",
				description: "Django-like async ORM with Aerich migrations.",
				isHidden: withoutDatabase,
			},
			{
				code: "psycopg",
				userView: "Psycopg",
				description: "Raw SQL over an async psycopg connection pool. PostgreSQL only.",
				isHidden: (context) => context.get("db") !== "postgresql",
			},
			{
				code: "piccolo",
				userView: "Piccolo",
				description: "Async query builder and ORM. Not available for MySQL.",
				isHidden: (context) => withoutDatabase(context) || context.get("db") === "mysql",
			},
		],
	});

	const ciType = defineSingleMenu({
		code: "ci_type",
		cliName: "ci",
		title: "CI",
		description: "Continuous integration pipeline to generate.",
		defaultCode: "none",
		entries: [
			{ code: "none", userView: "No CI", description: "No pipeline file is generated." },
			{
				code: "github",
				userView: "GitHub Actions",
				description: "A workflow that runs linters and tests on every push.",
			},
			{
				code: "gitlab_ci",
				cliName: "gitlab",
				userView: "GitLab CI",
				description: "A .gitlab-ci.yml with lint and test stages.",
			},
		],
	});

	const infrastructure = defineMultiMenu({
		id: "infrastructure",
		title: "Infrastructure",
		description: "Services started next to the application.",
		defaultCodes: [],
		entries: [
			{
				code: "enable_redis",
				cliName: "redis",
				userView: "Redis",
				description: "Redis connection pool and a container in docker-compose.",
			},
			{
				code: "enable_rmq",
				cliName: "rmq",
				userView: "RabbitMQ",
				description: "RabbitMQ channel pool and a container in docker-compose.",
			},
			{
				code: "enable_kafka",
				cliName: "kafka",
				userView: "Kafka",
				description: "Kafka producer wired into the application lifespan.",
			},
		],
	});

	const features = defineMultiMenu({
		id: "features",
		title: "Additional features",
		description: "Optional parts of the generated project.",
		defaultCodes: ["enable_routers", "enable_migrations", "add_dummy"],
		entries: [
			{
				code: "enable_taskiq",
				cliName: "taskiq",
				userView: "Taskiq",
				description: "Distributed task queue running on the selected broker.",
				isHidden: (context) =>
					!context.isEnabled("enable_redis") && !context.isEnabled("enable_rmq"),
			},
			{
				code: "enable_migrations",
				cliName: "migrations",
				userView: "Migrations",
				description: "Migration tooling for the chosen ORM.",
				isHidden: withoutOrm,
			},
			{
				code: "add_dummy",
				cliName: "dummy",
				userView: "Dummy model",
				description: "An example model with DAO and routes, useful as a starting point.",
				isHidden: withoutOrm,
			},
			{
				code: "enable_routers",
				cliName: "routers",
				userView: "Example routers",
				description: "Echo and health-check routes.",
			},
			{
				code: "self_hosted_swagger",
				cliName: "self-hosted-swagger",
				userView: "Self-hosted Swagger",
				description: "Serve the Swagger UI assets from the application instead of a CDN.",
			},
			{
				code: "prometheus_enabled",
				cliName: "prometheus",
				userView: "Prometheus",
				description: "Expose a /metrics endpoint with request instrumentation.",
			},
			{
				code: "sentry_enabled",
				cliName: "sentry",
				userView: "Sentry",
				description: "Report unhandled errors to Sentry.",
			},
			{
				code: "enable_loguru",
				cliName: "loguru",
				userView: "Loguru",
				description: "Route standard logging through Loguru.",
			},
			{
				code: "otlp_enabled",
				cliName: "opentelemetry",
				userView: "OpenTelemetry",
				description: "Export traces through OTLP and add a collector container.",
			},
			{
				code: "traefik_labels",
				cliName: "traefik",
				userView: "Traefik labels",
				description: "Add Traefik routing labels to the docker-compose services.",
			},
		],
	});

	return [apiType, database, orm, ciType, infrastructure, features];
}
