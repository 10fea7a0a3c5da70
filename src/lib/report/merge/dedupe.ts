import type { FindingRow, PageFindings, PageGroup } from "../types";

function rowTuple(row: FindingRow): string {
  return JSON.stringify([
    row.kind,
    row.issue,
    row.priority,
    row.details,
    row.description,
    row.fixGuidance,
    row.helpUrl,
  ]);
}

/** Same multiset of rows, same fingerprint, whatever the row order */
export function fingerprintRows(rows: readonly FindingRow[]): string {
  return JSON.stringify(rows.map(rowTuple).sort());
}

/**
 * Collapse pages whose findings are identical. URLs are visited in sorted
 * order so group order and representatives are stable between runs; the
 * first URL of each group is its representative and supplies the rows.
 */
export function groupByFingerprint(pages: PageFindings): PageGroup[] {
  const groups = new Map<string, PageGroup>();
  for (const url of [...pages.keys()].sort()) {
    const rows = pages.get(url) ?? [];
    const fingerprint = fingerprintRows(rows);
    const group = groups.get(fingerprint);
    if (group) group.urls.push(url);
    else groups.set(fingerprint, { fingerprint, urls: [url], rows });
  }
  return [...groups.values()];
}
