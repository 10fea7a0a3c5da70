import type { CsvTable, IssueCatalog } from "../types";
import { cleanCell } from "../utils/extractorTools";
import { CSV_PATTERNS, findCandidates } from "./locate";
import { loadFirstAccepted, warn, type LoadContext } from "./loadContext";

export interface IssuesOverview {
  path: string;
  /** The export as-is, for the Issues Summary sheet */
  table: CsvTable;
  catalog: IssueCatalog;
}

export function buildIssueCatalog(table: CsvTable): IssueCatalog {
  const catalog: IssueCatalog = new Map();
  for (const row of table.rows) {
    const name = cleanCell(row["Issue Name"]).trim();
    if (!name) continue;
    catalog.set(name.toLowerCase(), {
      priority: cleanCell(row["Issue Priority"]),
      description: cleanCell(row["Description"]),
      fixGuidance: cleanCell(row["How To Fix"]),
      helpUrl: cleanCell(row["Help URL"]),
      issueType: cleanCell(row["Issue Type"]),
    });
  }
  return catalog;
}

/** The loose `*issues*` glob also hits unrelated files; an `Issue Name` column is required */
export function acceptIssuesOverview(table: CsvTable): CsvTable | undefined {
  return table.columns.includes("Issue Name") ? table : undefined;
}

export async function loadIssuesOverview(
  exportDir: string,
  ctx: LoadContext
): Promise<IssuesOverview | undefined> {
  const candidates = await findCandidates(
    exportDir,
    CSV_PATTERNS.issuesOverview
  );
  const located = await loadFirstAccepted(
    candidates,
    acceptIssuesOverview,
    ctx,
    "Issues Overview"
  );
  if (!located) {
    warn(ctx, {
      kind: "missing-data",
      message: "No Issues Overview CSV found, skipping sheet.",
    });
    return undefined;
  }
  return {
    path: located.path,
    table: located.value,
    catalog: buildIssueCatalog(located.value),
  };
}
