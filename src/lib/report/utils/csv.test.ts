import { describe, expect, it } from "vitest";
import { CsvParseError } from "../errors";
import { parseCsv, parseCsvTable } from "./csv";

describe("parseCsvTable", () => {
  it("handles BOM, quoted commas, CRLF, blank and short rows", () => {
    const text =
      '\uFEFFIssue Name,Priority\r\n"Alt, missing","High"\r\n\r\nB\n';
    expect(parseCsvTable(text)).toEqual({
      columns: ["Issue Name", "Priority"],
      rows: [
        { "Issue Name": "Alt, missing", Priority: "High" },
        { "Issue Name": "B", Priority: "" },
      ],
    });
  });

  it("unescapes doubled quotes and keeps embedded newlines", () => {
    const table = parseCsvTable('a,b\n"say ""hi""","line1\nline2"\n');
    expect(table.rows).toEqual([{ a: 'say "hi"', b: "line1\nline2" }]);
  });

  it("returns an empty table for empty input", () => {
    expect(parseCsvTable("")).toEqual({ columns: [], rows: [] });
  });
});

describe("parseCsv", () => {
  it("rejects an unterminated quoted field", () => {
    expect(() => parseCsv('a\n"oops\n')).toThrow(CsvParseError);
    expect(() => parseCsv('a\n"oops\n')).toThrow(
      "Unterminated quoted field (line 2)"
    );
  });
});
