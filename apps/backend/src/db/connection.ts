import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { runtimeConfig } from "../config";

const MEMORY_DB = ":memory:";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const openDatabase = (sqlitePath: string = runtimeConfig.sqlitePath) => {
  if (sqlitePath === MEMORY_DB) {
    return new Database(MEMORY_DB);
  }

  const absolutePath = path.resolve(process.cwd(), sqlitePath);
  ensureDir(absolutePath);
  const db = new Database(absolutePath);
  // Several server processes may share this file; claims rely on SQLite's own write lock
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("synchronous = NORMAL");

  return db;
};
