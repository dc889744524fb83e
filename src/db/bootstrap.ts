import { promises as fs } from "fs";
import type * as pg from "pg";
import { getLog } from "../core/log.js";

const log = getLog(import.meta);

const DEFAULT_SCHEMA_PATH = "db/schema.sql";

/**
 * Creates the audit tables. The schema only uses `IF NOT EXISTS`, so applying
 * it to an existing database is harmless.
 */
export async function applySchema(pool: pg.Pool, filePath: string = DEFAULT_SCHEMA_PATH): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) {
    log.warn({ filePath }, "schema file is empty; nothing applied");
    return;
  }
  await pool.query(sql);
  log.debug({ filePath }, "applied audit schema");
}
