import type ExcelJS from "exceljs";
import { autoFitColumns } from "./formatting/autofit";
import { freezeRowsAbove, linkifyUrls, styleHeaderRow } from "./formatting/cellStyle";

/** Rows keyed by column header; numbers stay numeric in the sheet */
export interface SheetTable {
  columns: string[];
  rows: Record<string, string | number>[];
}

/** Plain table sheet: styled frozen header, linked URLs, fitted columns */
export function addTableSheet(
  wb: ExcelJS.Workbook,
  name: string,
  table: SheetTable
): ExcelJS.Worksheet {
  const ws = wb.addWorksheet(name);
  ws.addRow(table.columns);
  for (const record of table.rows) {
    ws.addRow(table.columns.map((col) => record[col] ?? ""));
  }
  styleHeaderRow(ws, 1);
  linkifyUrls(ws, 2);
  autoFitColumns(ws);
  freezeRowsAbove(ws, 2);
  return ws;
}
