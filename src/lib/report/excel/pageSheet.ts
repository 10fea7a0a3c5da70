import type ExcelJS from "exceljs";
import { FINDING_FIELDS, PAGE_COLUMNS, type PageGroup } from "../types";
import { autoFitColumns } from "./formatting/autofit";
import {
  freezeRowsAbove,
  linkifyUrls,
  setHyperlink,
  styleHeaderRow,
} from "./formatting/cellStyle";

/**
 * One sheet per group of identical pages:
 *
 *   URL  | https://example.com/a          (single page)
 *   URLs | 3 pages with identical issues  (group, then one linked row per URL)
 *   <blank>
 *   Type | Issue | Priority | Details | Description | How To Fix | Help URL
 *
 * Returns the row number of the findings header.
 */
export function addPageSheet(
  wb: ExcelJS.Workbook,
  name: string,
  group: PageGroup
): number {
  const ws = wb.addWorksheet(name);
  const { urls, rows } = group;

  if (urls.length === 1) {
    const row = ws.addRow(["URL", urls[0]]);
    setHyperlink(row.getCell(2), urls[0]);
  } else {
    ws.addRow(["URLs", `${urls.length} pages with identical issues`]);
    for (const url of urls) {
      const row = ws.addRow(["", url]);
      setHyperlink(row.getCell(2), url);
    }
  }
  ws.getCell("A1").font = { bold: true };
  ws.addRow([]);

  const headerRow = ws.addRow([...PAGE_COLUMNS]).number;
  for (const finding of rows) {
    ws.addRow(PAGE_COLUMNS.map((col) => finding[FINDING_FIELDS[col]]));
  }

  linkifyUrls(ws, headerRow + 1);
  styleHeaderRow(ws, headerRow);
  autoFitColumns(ws);
  freezeRowsAbove(ws, headerRow + 1);
  return headerRow;
}
