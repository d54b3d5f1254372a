import type Database from "better-sqlite3";
import { freezeReport } from "../report/report";
import type {
  Report,
  ReportItem,
  TransactionAction,
  TransactionRecord,
} from "../contracts";
import type {
  ActionKind,
  RunActionRow,
  RunFilters,
  RunItemRow,
  RunRow,
} from "./types";

// ============================================================
// Runs
// ============================================================

export interface SaveRunInput {
  transaction: TransactionRecord;
  report: Report;
  packPath?: string | null;
}

/**
 * Persist a closed run: its transaction log and every report item, in one
 * database transaction. Returns the stored run row.
 */
export function saveRun(db: Database.Database, input: SaveRunInput): RunRow {
  const { transaction, report } = input;

  const insertRun = db.prepare(`
    INSERT INTO runs (id, tool_id, title, name, dry_run, pack_path, started_at, closed_at, report_created_at, summary, item_count)
    VALUES (@id, @tool_id, @title, @name, @dry_run, @pack_path, @started_at, @closed_at, @report_created_at, @summary, @item_count)
  `);
  const insertAction = db.prepare(`
    INSERT INTO run_actions (run_id, kind, seq, payload)
    VALUES (@run_id, @kind, @seq, @payload)
  `);
  const insertItem = db.prepare(`
    INSERT INTO run_items (run_id, seq, category, severity, message, timeline, clip, timecode, data)
    VALUES (@run_id, @seq, @category, @severity, @message, @timeline, @clip, @timecode, @data)
  `);

  db.transaction(() => {
    insertRun.run({
      id: transaction.id,
      tool_id: report.toolId,
      title: report.title,
      name: transaction.name,
      dry_run: transaction.dryRun ? 1 : 0,
      pack_path: input.packPath ?? null,
      started_at: transaction.startedAt,
      closed_at: transaction.closedAt,
      report_created_at: report.createdAt,
      summary: JSON.stringify(report.summary),
      item_count: report.items.length,
    });

    const logs: Array<[ActionKind, readonly TransactionAction[]]> = [
      ["action", transaction.actions],
      ["rollback", transaction.rollback],
    ];
    for (const [kind, actions] of logs) {
      actions.forEach((action, seq) => {
        insertAction.run({
          run_id: transaction.id,
          kind,
          seq,
          payload: JSON.stringify(action),
        });
      });
    }

    report.items.forEach((item, seq) => {
      insertItem.run({
        run_id: transaction.id,
        seq,
        category: item.category,
        severity: item.severity,
        message: item.message,
        timeline: item.timeline,
        clip: item.clip,
        timecode: item.timecode,
        data: JSON.stringify(item.data),
      });
    });
  })();

  return getRun(db, transaction.id)!;
}

export function getRun(db: Database.Database, id: string): RunRow | undefined {
  return db.prepare("SELECT * FROM runs WHERE id = ?").get(id) as
    | RunRow
    | undefined;
}

export function listRuns(db: Database.Database, filters?: RunFilters): RunRow[] {
  let sql = "SELECT * FROM runs";
  const params: Record<string, number> = {};

  if (filters?.dryRun !== undefined) {
    sql += " WHERE dry_run = @dry_run";
    params.dry_run = filters.dryRun ? 1 : 0;
  }
  sql += " ORDER BY started_at DESC, rowid DESC";
  if (filters?.limit !== undefined) {
    sql += " LIMIT @limit";
    params.limit = filters.limit;
  }

  return db.prepare(sql).all(params) as RunRow[];
}

export function deleteRun(db: Database.Database, id: string): boolean {
  return db.prepare("DELETE FROM runs WHERE id = ?").run(id).changes > 0;
}

// ============================================================
// Transaction log
// ============================================================

export function getRunActions(
  db: Database.Database,
  runId: string,
  kind: ActionKind = "action"
): TransactionAction[] {
  const rows = db
    .prepare(
      "SELECT * FROM run_actions WHERE run_id = ? AND kind = ? ORDER BY seq ASC"
    )
    .all(runId, kind) as RunActionRow[];
  return rows.map((row) => JSON.parse(row.payload) as TransactionAction);
}

// ============================================================
// Report items
// ============================================================

export function getRunItems(db: Database.Database, runId: string): ReportItem[] {
  const rows = db
    .prepare("SELECT * FROM run_items WHERE run_id = ? ORDER BY seq ASC")
    .all(runId) as RunItemRow[];
  return rows.map((row) => ({
    category: row.category,
    severity: row.severity,
    message: row.message,
    timeline: row.timeline,
    clip: row.clip,
    timecode: row.timecode,
    data: JSON.parse(row.data) as Record<string, unknown>,
  }));
}

/** Rebuild the stored report of a run, or undefined for an unknown id. */
export function loadRunReport(db: Database.Database, runId: string): Report | undefined {
  const run = getRun(db, runId);
  if (!run) return undefined;

  return freezeReport({
    toolId: run.tool_id,
    title: run.title,
    createdAt: run.report_created_at,
    items: getRunItems(db, runId),
    summary: JSON.parse(run.summary) as Record<string, unknown>,
  });
}
