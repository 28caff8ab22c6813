import Database from "better-sqlite3";
import { mkdirSync, readFileSync } from "fs";
import { dirname } from "path";
import { fileURLToPath } from "url";

export type DB = Database.Database;

const MIGRATIONS = ["001_init.sql"];

/** Open a database for writing, creating the file and applying migrations. */
export function openDb(dbOrPath: DB | string): DB {
  if (typeof dbOrPath !== "string") {
    applyMigrations(dbOrPath);
    return dbOrPath;
  }
  if (dbOrPath !== ":memory:") mkdirSync(dirname(dbOrPath), { recursive: true });
  const db = new Database(dbOrPath);
  db.pragma("foreign_keys = ON");
  try {
    applyMigrations(db);
  } catch (err) {
    db.close();
    throw err;
  }
  return db;
}

/** Open an existing database read-only; used once per poll. */
export function openReadonly(path: string): DB {
  return new Database(path, { readonly: true, fileMustExist: true });
}

/** Create the file if needed and bring its schema up to date. */
export function ensureSchema(path: string): void {
  openDb(path).close();
}

function applyMigrations(db: DB): void {
  for (const file of MIGRATIONS) {
    const sql = readFileSync(fileURLToPath(new URL(`./migrations/${file}`, import.meta.url)), "utf8");
    db.exec(sql);
  }
}
