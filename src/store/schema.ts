import type Database from "better-sqlite3";

const CURRENT_VERSION = 1;

const SCHEMA_V1 = `
-- One row per closed relink run
CREATE TABLE IF NOT EXISTS runs (
    id                TEXT PRIMARY KEY,
    tool_id           TEXT NOT NULL,
    title             TEXT NOT NULL,
    name              TEXT NOT NULL,
    dry_run           INTEGER NOT NULL DEFAULT 1,
    pack_path         TEXT,
    started_at        TEXT NOT NULL,
    closed_at         TEXT NOT NULL,
    report_created_at TEXT NOT NULL,
    summary           TEXT NOT NULL DEFAULT '{}',
    item_count        INTEGER NOT NULL DEFAULT 0,
    created_at        DATETIME DEFAULT CURRENT_TIMESTAMP
);

-- Transaction log: recorded actions and compensating rollback actions
CREATE TABLE IF NOT EXISTS run_actions (
    id       INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id   TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
    kind     TEXT NOT NULL DEFAULT 'action',
    seq      INTEGER NOT NULL,
    payload  TEXT NOT NULL,
    UNIQUE(run_id, kind, seq)
);

-- Report items in report order
CREATE TABLE IF NOT EXISTS run_items (
    id        INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id    TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
    seq       INTEGER NOT NULL,
    category  TEXT NOT NULL,
    severity  TEXT NOT NULL,
    message   TEXT NOT NULL,
    timeline  TEXT,
    clip      TEXT,
    timecode  TEXT,
    data      TEXT NOT NULL DEFAULT '{}',
    UNIQUE(run_id, seq)
);

-- Schema versioning
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER NOT NULL,
    applied_at  DATETIME DEFAULT CURRENT_TIMESTAMP
);

-- Indexes
CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
CREATE INDEX IF NOT EXISTS idx_run_actions_run ON run_actions(run_id);
CREATE INDEX IF NOT EXISTS idx_run_items_run ON run_items(run_id);
CREATE INDEX IF NOT EXISTS idx_run_items_severity ON run_items(severity);
`;

/**
 * Returns the current schema version from the database, or 0 if no schema exists.
 */
function getSchemaVersion(db: Database.Database): number {
  try {
    const row = db
      .prepare("SELECT MAX(version) as version FROM schema_version")
      .get() as { version: number | null } | undefined;
    return row?.version ?? 0;
  } catch {
    // Table doesn't exist yet
    return 0;
  }
}

/**
 * Ensures the database schema is up to date.
 * Runs migrations inside a transaction. Idempotent, so safe on every startup.
 */
export function ensureSchema(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);

  if (currentVersion >= CURRENT_VERSION) {
    return;
  }

  db.transaction(() => {
    if (currentVersion < 1) {
      db.exec(SCHEMA_V1);
      db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(
        CURRENT_VERSION
      );
    }
  })();
}
