import type ExcelJS from "exceljs";
import type { PageGroup } from "../types";
import { autoFitColumns } from "./formatting/autofit";
import {
  freezeRowsAbove,
  setHyperlink,
  styleHeaderRow,
} from "./formatting/cellStyle";

export const PAGES_INDEX_COLUMNS = [
  "URL",
  "Sheet",
  "Accessibility",
  "Issues",
  "Duplicates",
] as const;

export interface PageIndexEntry {
  url: string;
  sheet: string;
  accessibility: number;
  issues: number;
  /** Group size when the sheet is shared by several pages */
  duplicates?: number;
}

/** One entry per page, pages of a shared sheet each pointing at it */
export function pageIndexEntries(
  groups: readonly { group: PageGroup; sheet: string }[]
): PageIndexEntry[] {
  return groups.flatMap(({ group, sheet }) => {
    const accessibility = group.rows.filter(
      (r) => r.kind === "Accessibility"
    ).length;
    const issues = group.rows.filter((r) => r.kind === "Issue").length;
    const duplicates = group.urls.length > 1 ? group.urls.length : undefined;
    return group.urls.map((url) => ({
      url,
      sheet,
      accessibility,
      issues,
      duplicates,
    }));
  });
}

/** `#'It''s here'!A1` */
export function internalSheetLink(sheet: string): string {
  return `#'${sheet.replace(/'/g, "''")}'!A1`;
}

export function addPagesIndexSheet(
  wb: ExcelJS.Workbook,
  name: string,
  entries: readonly PageIndexEntry[]
): ExcelJS.Worksheet {
  const ws = wb.addWorksheet(name);
  ws.addRow([...PAGES_INDEX_COLUMNS]);
  for (const entry of entries) {
    const row = ws.addRow([
      entry.url,
      entry.sheet,
      entry.accessibility,
      entry.issues,
      entry.duplicates ?? null,
    ]);
    setHyperlink(row.getCell(1), entry.url);
    setHyperlink(row.getCell(2), internalSheetLink(entry.sheet), entry.sheet);
  }
  styleHeaderRow(ws, 1);
  autoFitColumns(ws);
  freezeRowsAbove(ws, 2);
  return ws;
}
