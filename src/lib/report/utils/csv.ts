import { readFile } from "node:fs/promises";
import type { CsvTable } from "../types";
import { CsvParseError } from "../errors";

export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let cur: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let quoteOpenedAt = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const next = text[i + 1];
    if (ch === "\n") line++;
    if (inQuotes) {
      if (ch === '"' && next === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else field += ch;
    } else {
      if (ch === '"') {
        inQuotes = true;
        quoteOpenedAt = line;
      } else if (ch === ",") {
        cur.push(field);
        field = "";
      } else if (ch === "\r") {
        /* CRLF */
      } else if (ch === "\n") {
        cur.push(field);
        rows.push(cur);
        cur = [];
        field = "";
      } else field += ch;
    }
  }
  if (inQuotes) throw new CsvParseError("Unterminated quoted field", quoteOpenedAt);
  cur.push(field);
  if (cur.length > 1 || cur[0] !== "") rows.push(cur);
  return rows;
}

/** Header row first; blank rows dropped; short rows padded with "" */
export function parseCsvTable(text: string): CsvTable {
  const matrix = parseCsv(text.replace(/^\uFEFF/, ""));
  const [header, ...body] = matrix;
  if (!header) return { columns: [], rows: [] };
  const columns = header.map((h) => h.trim());
  const rows = body
    .filter((cells) => cells.some((c) => c.trim() !== ""))
    .map((cells) => {
      const record: Record<string, string> = {};
      columns.forEach((col, idx) => {
        record[col] = cells[idx] ?? "";
      });
      return record;
    });
  return { columns, rows };
}

export async function readCsvFile(filePath: string): Promise<CsvTable> {
  const text = await readFile(filePath, "utf8");
  return parseCsvTable(text);
}
