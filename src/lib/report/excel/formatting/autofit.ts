import type { CellValue, Worksheet } from "exceljs";

export interface ColumnFitOptions {
  min?: number;
  max?: number;
  pad?: number;
}

function visibleText(v: CellValue): string {
  if (v == null) return "";
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return v.toString();
  if (v instanceof Date) return v.toISOString().slice(0, 10);
  if ("text" in v && v.text != null) return String(v.text);
  if ("richText" in v && Array.isArray(v.richText))
    return v.richText.map((r: { text: string }) => r.text).join("");
  if ("result" in v && v.result != null) return String(v.result);
  return "";
}

function longestLine(text: string): number {
  return text.split("\n").reduce((a, line) => Math.max(a, line.length), 0);
}

/**
 * Size every used column to its longest visible line (links by their text),
 * clamped to [min, max].
 */
export function autoFitColumns(
  ws: Worksheet,
  { min = 12, max = 60, pad = 2 }: ColumnFitOptions = {}
): void {
  for (let colIdx = 1; colIdx <= ws.columnCount; colIdx++) {
    const col = ws.getColumn(colIdx);
    let width = min;
    col.eachCell({ includeEmpty: false }, (cell) => {
      width = Math.max(width, longestLine(visibleText(cell.value)) + pad);
    });
    col.width = Math.min(width, max);
  }
}
