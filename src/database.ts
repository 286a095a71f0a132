import pg from "pg";
import { PGlite } from "@electric-sql/pglite";
import type { DbClient } from "./schemaExtractor.js";

export interface Database {
	readonly client: DbClient;
	readonly kind: "pglite" | "postgres";
	close(): Promise<void>;
}

const PGLITE_PREFIX = "pglite:";

/**
 * Open a database for schema extraction.
 *
 * Connection string formats:
 * - `pglite:` - In-memory PGlite database
 * - `pglite:/path/to/dir` - PGlite database persisted to filesystem
 * - `postgresql://...` or other - PostgreSQL connection string
 */
export async function openDatabase(connectionString: string): Promise<Database> {
	if (connectionString.startsWith(PGLITE_PREFIX)) {
		const path = connectionString.slice(PGLITE_PREFIX.length);
		const db = new PGlite(path || undefined);
		await db.waitReady;
		return {
			client: db,
			kind: "pglite",
			close: () => db.close(),
		};
	}

	const client = new pg.Client({ connectionString });
	await client.connect();
	return {
		client: {
			query: async <T>(sql: string, params?: unknown[]): Promise<{ rows: T[] }> => {
				const result = await client.query(sql, params);
				return { rows: result.rows };
			},
		},
		kind: "postgres",
		close: () => client.end(),
	};
}
