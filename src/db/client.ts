import Database from "better-sqlite3";
import { sql } from "drizzle-orm";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";
import { logger } from "../lib/logger.js";

export type Db = BetterSQLite3Database<typeof schema>;

export interface DbHandle {
  db: Db;
  close: () => void;
}

export function openDatabase(file: string): DbHandle {
  const sqlite = new Database(file);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(schema.CREATE_TABLES_SQL);

  logger.debug(`SQLite database opened at ${file}`);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => {
      sqlite.close();
      logger.debug(`SQLite database ${file} closed`);
    },
  };
}

export function ping(db: Db): boolean {
  const row = db.get<{ ok: number }>(sql`SELECT 1 AS ok`);
  return row.ok === 1;
}
