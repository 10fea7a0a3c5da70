import type { CsvTable } from "../types";
import { isAssetUrl, normalizeUrl } from "../url";
import { CSV_PATTERNS, findCandidates } from "./locate";
import { loadFirstAccepted, warn, type LoadContext } from "./loadContext";

/** Internal HTML pages of the `Internal:All` tab, normalized */
export function internalHtmlPages(table: CsvTable): Set<string> | undefined {
  if (
    !table.columns.includes("Address") ||
    !table.columns.includes("Content Type")
  )
    return undefined;
  const pages = new Set<string>();
  for (const row of table.rows) {
    const address = (row["Address"] ?? "").trim();
    const contentType = (row["Content Type"] ?? "").toLowerCase();
    if (!address || !contentType.includes("html")) continue;
    if (isAssetUrl(address)) continue;
    pages.add(normalizeUrl(address));
  }
  return pages;
}

/**
 * Undefined when the export is missing; callers then keep every page. A
 * loaded inventory filters even when it holds no HTML pages at all.
 */
export async function loadInternalPages(
  exportDir: string,
  ctx: LoadContext
): Promise<Set<string> | undefined> {
  const candidates = await findCandidates(exportDir, CSV_PATTERNS.internalPages);
  const located = await loadFirstAccepted(
    candidates,
    internalHtmlPages,
    ctx,
    "Internal:All"
  );
  if (!located) {
    warn(ctx, {
      kind: "missing-data",
      message: "No Internal:All CSV found; pages are not filtered.",
    });
    return undefined;
  }
  return located.value;
}
