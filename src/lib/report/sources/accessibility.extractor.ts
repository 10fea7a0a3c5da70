import type { CsvTable, FindingRow } from "../types";
import { normalizeUrl } from "../url";
import { cleanCell, pickColumn } from "../utils/extractorTools";
import { CSV_PATTERNS, findCandidates } from "./locate";
import { loadFirstAccepted, warn, type LoadContext } from "./loadContext";

/** Bulk exports call the page column `Address`; some versions use `URL` */
export const ACCESSIBILITY_URL_COLUMNS = ["Address", "URL"] as const;

export interface AccessibilityViolations {
  path: string;
  /** Source table with the page column renamed to `URL` and normalized */
  table: CsvTable;
}

export function acceptAccessibility(table: CsvTable): CsvTable | undefined {
  const urlCol = pickColumn(table.columns, ACCESSIBILITY_URL_COLUMNS);
  if (!urlCol) return undefined;
  // a stray `URL` column next to `Address` gives way to the renamed one
  const kept = table.columns.filter((c) => c === urlCol || c !== "URL");
  const columns = kept.map((c) => (c === urlCol ? "URL" : c));
  const rows = table.rows.map((row) => {
    const renamed: Record<string, string> = {};
    for (const col of kept) {
      if (col === urlCol) continue;
      renamed[col] = row[col] ?? "";
    }
    renamed["URL"] = normalizeUrl(row[urlCol] ?? "");
    return renamed;
  });
  return { columns, rows };
}

export function violationToFinding(row: Record<string, string>): FindingRow {
  return {
    kind: "Accessibility",
    issue: cleanCell(row["Issue"]),
    priority: cleanCell(row["Priority"]),
    details: cleanCell(row["Location on Page"]),
    description: cleanCell(row["Issue Description"]),
    fixGuidance: cleanCell(row["How To Fix"]),
    helpUrl: cleanCell(row["Help URL"]),
  };
}

export async function loadAccessibility(
  exportDir: string,
  ctx: LoadContext
): Promise<AccessibilityViolations | undefined> {
  const candidates = await findCandidates(exportDir, CSV_PATTERNS.accessibility);
  const located = await loadFirstAccepted(
    candidates,
    acceptAccessibility,
    ctx,
    "Accessibility Violations"
  );
  if (!located) {
    warn(ctx, {
      kind: "missing-data",
      message: "No Accessibility Violations CSV found.",
    });
    return undefined;
  }
  return { path: located.path, table: located.value };
}

/** Aggregate data straight from the crawler; passed through untouched */
export async function loadAccessibilitySummary(
  exportDir: string,
  ctx: LoadContext
): Promise<CsvTable | undefined> {
  const candidates = await findCandidates(
    exportDir,
    CSV_PATTERNS.accessibilitySummary
  );
  const located = await loadFirstAccepted(
    candidates,
    (table) => (table.columns.length ? table : undefined),
    ctx,
    "Accessibility Violations Summary"
  );
  return located?.value;
}
