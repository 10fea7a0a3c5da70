import type { CsvTable, FindingRow, PageFindings } from "../types";
import { violationToFinding } from "../sources/accessibility.extractor";
import type { IssueReports } from "../sources/issueReports.extractor";

export interface AggregateInput {
  /** Violations table with a normalized `URL` column */
  accessibility?: CsvTable;
  issueReports: IssueReports;
  /** Undefined means the inventory was missing: nothing is filtered */
  internalPages?: ReadonlySet<string>;
}

export function isInternal(
  url: string,
  internalPages: ReadonlySet<string> | undefined
): boolean {
  return !internalPages || internalPages.has(url);
}

/**
 * Combine accessibility violations and issue report rows per page. Pages are
 * visited in URL order; each gets its violations first (export order), then
 * its issue rows. Pages left without findings are dropped.
 */
export function aggregatePages({
  accessibility,
  issueReports,
  internalPages,
}: AggregateInput): PageFindings {
  const violations = new Map<string, FindingRow[]>();
  for (const row of accessibility?.rows ?? []) {
    const url = row["URL"] ?? "";
    if (!url || !isInternal(url, internalPages)) continue;
    const list = violations.get(url) ?? [];
    list.push(violationToFinding(row));
    violations.set(url, list);
  }

  const urls = new Set<string>([...violations.keys()]);
  for (const url of issueReports.keys()) {
    if (isInternal(url, internalPages)) urls.add(url);
  }

  const pages: PageFindings = new Map();
  for (const url of [...urls].sort()) {
    const rows = [
      ...(violations.get(url) ?? []),
      ...(issueReports.get(url) ?? []),
    ];
    if (rows.length) pages.set(url, rows);
  }
  return pages;
}
