import ExcelJS from "exceljs";
import type { CsvTable, PageGroup } from "../types";
import { addPageSheet } from "./pageSheet";
import { addPagesIndexSheet, pageIndexEntries } from "./pagesIndex";
import { SheetNamer } from "./sheetName";
import { addTableSheet, type SheetTable } from "./tableSheet";

export const SHEET_NAMES = {
  issuesSummary: "Issues Summary",
  accessibilitySummary: "Accessibility Summary",
  pages: "Pages",
} as const;

export interface ReportData {
  issuesOverview?: CsvTable;
  /** From the crawler's summary export, or computed from the violations */
  accessibilitySummary?: SheetTable;
  groups: PageGroup[];
}

export interface BuiltReport {
  workbook: ExcelJS.Workbook;
  sheetNames: string[];
  pageCount: number;
}

/**
 * Summaries first, then the Pages index, then one sheet per page group.
 * Returns null when there is nothing to put in a workbook.
 */
export function buildReportWorkbook(data: ReportData): BuiltReport | null {
  const { issuesOverview, accessibilitySummary, groups } = data;
  if (!issuesOverview && !accessibilitySummary && !groups.length) return null;

  const wb = new ExcelJS.Workbook();
  if (issuesOverview)
    addTableSheet(wb, SHEET_NAMES.issuesSummary, issuesOverview);
  if (accessibilitySummary)
    addTableSheet(wb, SHEET_NAMES.accessibilitySummary, accessibilitySummary);

  const namer = new SheetNamer(Object.values(SHEET_NAMES));
  const named = groups.map((group) => ({
    group,
    sheet: namer.forUrl(group.urls[0] ?? ""),
  }));
  const entries = pageIndexEntries(named);
  addPagesIndexSheet(wb, SHEET_NAMES.pages, entries);
  for (const { group, sheet } of named) addPageSheet(wb, sheet, group);

  return {
    workbook: wb,
    sheetNames: wb.worksheets.map((ws) => ws.name),
    pageCount: entries.length,
  };
}
