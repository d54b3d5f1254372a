import Database from "better-sqlite3";

/**
 * Opens (or creates) the run history database at the given path.
 * Enables WAL mode for better concurrent read performance.
 * Uses `:memory:` for testing.
 */
export function openDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  return db;
}
