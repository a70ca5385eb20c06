import type { ContextValue } from "../engine/context.js";

/** Connection defaults forwarded to the templates as `db_info`. */
export interface DatabaseInfo {
	readonly [key: string]: ContextValue;
	name: string;
	image: string | null;
	driver: string | null;
	async_driver: string | null;
	port: number | null;
	driver_short: string | null;
}

export const DATABASES = {
	none: {
		name: "none",
		image: null,
		driver: null,
		async_driver: null,
		port: null,
		driver_short: null,
	},
	sqlite: {
		name: "sqlite",
		image: null,
		driver: "sqlite",
		async_driver: "sqlite+aiosqlite",
		port: null,
		driver_short: "sqlite",
	},
	mysql: {
		name: "mysql",
		image: "bitnami/mysql:8.0.30",
		driver: "mysql",
		async_driver: "mysql+aiomysql",
		port: 3306,
		driver_short: "mysql",
	},
	postgresql: {
		name: "postgresql",
		image: "postgres:16.3-bullseye",
		driver: "postgresql",
		async_driver: "postgresql+asyncpg",
		port: 5432,
		driver_short: "postgres",
	},
} as const satisfies Record<string, DatabaseInfo>;
