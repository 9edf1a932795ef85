import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { VERBOSE, vlog } from "../util/verbose.js";

export const MEMORY = ":memory:";

function ensureDirExists(dirPath: string) {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Open (creating if needed) a SQLite file with WAL and foreign keys on.
 * With VERBOSE=1 every statement is traced through vlog.
 */
export function openDb(filePath: string): Database.Database {
  const inMemory = filePath === MEMORY;
  if (!inMemory) ensureDirExists(path.dirname(path.resolve(filePath)));
  const db = new Database(inMemory ? MEMORY : path.resolve(filePath), {
    fileMustExist: false,
    verbose: VERBOSE ? (sql) => vlog({ msg: "sql", sql: String(sql).trim().slice(0, 240) }) : undefined,
  });
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");
  return db;
}
