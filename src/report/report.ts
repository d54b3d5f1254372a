import type {
  Report,
  ReportItem,
  ReportSummary,
  Severity,
} from "../contracts";

export type { Report, ReportItem, ReportSummary, Severity };

/** Optional tags and payload attached to a report item. */
export interface ItemDetails {
  clip?: string | null;
  timeline?: string | null;
  timecode?: string | null;
  data?: Record<string, unknown>;
}

export function createItem(
  severity: Severity,
  category: string,
  message: string,
  details: ItemDetails = {}
): ReportItem {
  return {
    category,
    severity,
    message,
    timeline: details.timeline ?? null,
    clip: details.clip ?? null,
    timecode: details.timecode ?? null,
    data: details.data ?? {},
  };
}

export function itemInfo(category: string, message: string, details?: ItemDetails): ReportItem {
  return createItem("info", category, message, details);
}

export function itemWarning(category: string, message: string, details?: ItemDetails): ReportItem {
  return createItem("warning", category, message, details);
}

export function itemError(category: string, message: string, details?: ItemDetails): ReportItem {
  return createItem("error", category, message, details);
}

/**
 * Append-only report under construction. One per tool invocation; hand it
 * through the run and call finish() once to get the immutable Report.
 */
export class ReportBuilder {
  readonly toolId: string;
  readonly title: string;
  readonly createdAt: string;
  private readonly items: ReportItem[] = [];
  private summary: ReportSummary = {};
  private finished = false;

  constructor(toolId: string, title: string, createdAt: string = new Date().toISOString()) {
    this.toolId = toolId;
    this.title = title;
    this.createdAt = createdAt;
  }

  add(item: ReportItem): this {
    this.assertOpen();
    this.items.push(item);
    return this;
  }

  addAll(items: Iterable<ReportItem>): this {
    for (const item of items) this.add(item);
    return this;
  }

  info(category: string, message: string, details?: ItemDetails): this {
    return this.add(itemInfo(category, message, details));
  }

  warning(category: string, message: string, details?: ItemDetails): this {
    return this.add(itemWarning(category, message, details));
  }

  error(category: string, message: string, details?: ItemDetails): this {
    return this.add(itemError(category, message, details));
  }

  setSummary(summary: ReportSummary): this {
    this.assertOpen();
    this.summary = { ...summary };
    return this;
  }

  count(severity: Severity): number {
    return this.items.filter((i) => i.severity === severity).length;
  }

  get size(): number {
    return this.items.length;
  }

  finish(): Report {
    this.assertOpen();
    this.finished = true;
    return freezeReport({
      toolId: this.toolId,
      title: this.title,
      createdAt: this.createdAt,
      items: this.items,
      summary: this.summary,
    });
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error(`Report "${this.toolId}" is already finished.`);
    }
  }
}

export function freezeReport(report: Report): Report {
  return Object.freeze({
    toolId: report.toolId,
    title: report.title,
    createdAt: report.createdAt,
    items: Object.freeze(report.items.map((item) => Object.freeze({ ...item }))),
    summary: Object.freeze({ ...report.summary }),
  });
}

/** Concatenate the items of several reports into one aggregate report. */
export function mergeReports(reports: readonly Report[], title: string): Report {
  const merged = new ReportBuilder("aggregate", title);
  for (const report of reports) {
    merged.addAll(report.items);
  }
  merged.setSummary({ reports: reports.length });
  return merged.finish();
}
