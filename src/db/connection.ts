import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { log } from "../log.js";
import { migrateDb } from "./migrate.js";

export type Db = Database.Database;

function ensureDirExists(dirPath: string) {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

/** Open (creating if needed) and migrate a database. `:memory:` gives a private in-process store. */
export function openDb(filePath: string): Db {
  const inMemory = filePath === ":memory:";
  const file = inMemory ? filePath : path.resolve(filePath);
  if (!inMemory) ensureDirExists(path.dirname(file));
  const db = new Database(file, { fileMustExist: false });
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  migrateDb(db, log);
  log.debug({ msg: "db_open", path: file });
  return db;
}

const cache = new Map<string, Db>();

export function getDb(filePath: string): Db {
  const cached = cache.get(filePath);
  if (cached) return cached;
  const db = openDb(filePath);
  if (filePath !== ":memory:") cache.set(filePath, db);
  return db;
}

export function closeAll(): void {
  for (const db of cache.values()) db.close();
  cache.clear();
}
