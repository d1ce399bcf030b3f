import fs from "node:fs/promises";
import path from "node:path";
import { Pool } from "pg";
import type { AppConfig } from "./env";

/** The slice of a pg pool the stores need. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export function createPool(config: AppConfig): Pool {
  return new Pool({
    connectionString: config.databaseUrl,
    ssl: config.pgSsl ? { rejectUnauthorized: false } : false,
    max: config.pgPoolMax,
  });
}

export function asQueryable(pool: Pool): Queryable {
  return {
    query: (text, params) => pool.query(text, params),
  };
}

/**
 * `server/db/schema.sql` under the project root. Resolved from the working
 * directory so the seeder finds it from sources and from `dist/` alike.
 */
export function schemaPath(root: string = process.cwd()): string {
  return path.resolve(root, "server", "db", "schema.sql");
}

export function loadSchemaSql(root?: string): Promise<string> {
  return fs.readFile(schemaPath(root), "utf8");
}
