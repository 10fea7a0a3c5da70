import type { Alignment, Cell, Fill, Font, Worksheet } from "exceljs";
import { isAbsoluteUrl } from "../../url";

export const HEADER_FONT: Partial<Font> = {
  bold: true,
  color: { argb: "FFFFFFFF" },
  size: 11,
};
export const HEADER_FILL: Fill = {
  type: "pattern",
  pattern: "solid",
  fgColor: { argb: "FF2F5496" },
};
export const WRAP_ALIGNMENT: Partial<Alignment> = {
  wrapText: true,
  vertical: "top",
};
export const LINK_FONT: Partial<Font> = {
  color: { argb: "FF0563C1" },
  underline: true,
};

export function styleHeaderRow(ws: Worksheet, rowNumber: number): void {
  const row = ws.getRow(rowNumber);
  row.eachCell({ includeEmpty: true }, (cell) => {
    cell.font = { ...HEADER_FONT };
    cell.fill = { ...HEADER_FILL };
    cell.alignment = { ...WRAP_ALIGNMENT };
  });
  row.commit();
}

export function setHyperlink(cell: Cell, target: string, text = target): void {
  cell.value = { text, hyperlink: target };
  cell.font = { ...(cell.font ?? {}), ...LINK_FONT };
}

/** Turn every cell below `fromRow` holding a bare absolute URL into a link */
export function linkifyUrls(ws: Worksheet, fromRow: number): void {
  ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber < fromRow) return;
    row.eachCell({ includeEmpty: false }, (cell) => {
      const v = cell.value;
      if (typeof v === "string" && isAbsoluteUrl(v)) setHyperlink(cell, v);
    });
  });
}

/** Keep everything above `belowRow` visible while scrolling */
export function freezeRowsAbove(ws: Worksheet, belowRow: number): void {
  ws.views = [{ state: "frozen", xSplit: 0, ySplit: belowRow - 1 }];
}
