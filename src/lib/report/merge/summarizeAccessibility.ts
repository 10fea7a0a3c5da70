import type { CsvTable } from "../types";
import type { SheetTable } from "../excel/tableSheet";
import { cleanCell } from "../utils/extractorTools";

const ISSUE_COLUMN_NAMES = ["issue", "violation", "issue name"];

/** Named issue column, else the column right after the URL */
export function accessibilityIssueColumn(
  columns: readonly string[]
): string | undefined {
  return (
    columns.find((c) => ISSUE_COLUMN_NAMES.includes(c.toLowerCase())) ??
    columns[1]
  );
}

/**
 * Stand-in for the crawler's own summary export: violations per issue with
 * the number of distinct pages, most frequent first (ties by issue name).
 */
export function summarizeAccessibility(
  table: CsvTable
): SheetTable | undefined {
  const issueCol = accessibilityIssueColumn(table.columns);
  if (!issueCol) return undefined;
  const stats = new Map<string, { count: number; pages: Set<string> }>();
  for (const row of table.rows) {
    const issue = cleanCell(row[issueCol]).trim();
    if (!issue) continue;
    const entry = stats.get(issue) ?? { count: 0, pages: new Set<string>() };
    entry.count++;
    entry.pages.add(row["URL"] ?? "");
    stats.set(issue, entry);
  }
  const ordered = [...stats.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .sort(([, a], [, b]) => b.count - a.count);
  return {
    columns: [issueCol, "Count", "Pages Affected"],
    rows: ordered.map(([issue, s]) => ({
      [issueCol]: issue,
      Count: s.count,
      "Pages Affected": s.pages.size,
    })),
  };
}
