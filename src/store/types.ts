import type { Severity } from "../contracts";

/** Kind of transaction log entry */
export type ActionKind = "action" | "rollback";

/** Database row for a recorded run */
export interface RunRow {
  id: string;
  tool_id: string;
  title: string;
  name: string;
  dry_run: 0 | 1;
  pack_path: string | null;
  started_at: string;
  closed_at: string;
  report_created_at: string;
  /** JSON-encoded report summary */
  summary: string;
  item_count: number;
  created_at: string;
}

/** Database row for a transaction log entry */
export interface RunActionRow {
  id: number;
  run_id: string;
  kind: ActionKind;
  seq: number;
  /** JSON-encoded TransactionAction */
  payload: string;
}

/** Database row for a report item */
export interface RunItemRow {
  id: number;
  run_id: string;
  seq: number;
  category: string;
  severity: Severity;
  message: string;
  timeline: string | null;
  clip: string | null;
  timecode: string | null;
  /** JSON-encoded item data */
  data: string;
}

/** Filters for listing runs */
export interface RunFilters {
  dryRun?: boolean;
  limit?: number;
}
