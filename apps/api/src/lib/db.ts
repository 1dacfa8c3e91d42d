import { Pool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "../db/schema.js";
import { moduleLogger } from "./logger.js";

export type Database = NodePgDatabase<typeof schema>;

const log = moduleLogger("db");

let _pool: Pool | null = null;
let _db: Database | null = null;

export function getDatabase(databaseUrl: string): Database {
  if (!_db) {
    _pool = new Pool({ connectionString: databaseUrl, max: 10 });
    _pool.on("error", (err: Error) => {
      log.error({ err }, "idle client error");
    });
    _db = drizzle(_pool, { schema });
  }
  return _db;
}

export async function closeDatabase(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
    _db = null;
  }
}
