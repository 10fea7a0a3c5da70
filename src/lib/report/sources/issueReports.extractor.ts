import path from "node:path";
import type { CsvTable, FindingRow, IssueCatalog } from "../types";
import { isCsvFileName } from "../../files/validate";
import { isInternal } from "../merge/aggregatePages";
import { matchIssue } from "../merge/matchIssue";
import { normalizeUrl } from "../url";
import { errorMessage } from "../errors";
import { readCsvFile } from "../utils/csv";
import {
  cleanCell,
  issueNameFromFileName,
  pickColumn,
} from "../utils/extractorTools";
import { ISSUE_REPORTS_DIR, listFiles } from "./locate";
import { warn, type LoadContext } from "./loadContext";

/** Normalized page URL -> issue findings, in report file order */
export type IssueReports = Map<string, FindingRow[]>;

const ADDRESS_COLUMNS = ["Address", "URL"] as const;
const NOISE_COLUMNS = new Set(["Indexability", "Indexability Status"]);

/** Inlinks reports describe links pointing at a page, not the page itself */
export function isInlinksReport(fileName: string): boolean {
  return fileName.toLowerCase().includes("inlinks");
}

/** `Column: value; ...` for every non-empty column but the address and noise */
export function detailsOf(
  row: Record<string, string>,
  columns: readonly string[],
  addressColumn: string
): string {
  const parts: string[] = [];
  for (const col of columns) {
    if (col === addressColumn || NOISE_COLUMNS.has(col)) continue;
    const value = cleanCell(row[col]);
    if (value.trim()) parts.push(`${col}: ${value}`);
  }
  return parts.join("; ");
}

export function issueReportFindings(
  fileName: string,
  table: CsvTable,
  catalog: IssueCatalog,
  internalPages: ReadonlySet<string> | undefined
): Map<string, FindingRow[]> | undefined {
  const addressColumn = pickColumn(table.columns, ADDRESS_COLUMNS);
  if (!addressColumn) return undefined;
  const meta = matchIssue(issueNameFromFileName(fileName), catalog);
  const findings = new Map<string, FindingRow[]>();
  for (const row of table.rows) {
    const raw = cleanCell(row[addressColumn]).trim();
    if (!raw) continue;
    const url = normalizeUrl(raw);
    if (!isInternal(url, internalPages)) continue;
    const list = findings.get(url) ?? [];
    list.push({
      kind: "Issue",
      issue: meta.name,
      priority: meta.priority,
      details: detailsOf(row, table.columns, addressColumn),
      description: meta.description,
      fixGuidance: meta.fixGuidance,
      helpUrl: meta.helpUrl,
    });
    findings.set(url, list);
  }
  return findings;
}

/**
 * One CSV per issue type lives in `issues_reports/`. Files are read in name
 * order; a file that cannot be parsed is skipped with a warning.
 */
export async function loadIssueReports(
  exportDir: string,
  catalog: IssueCatalog,
  internalPages: ReadonlySet<string> | undefined,
  ctx: LoadContext
): Promise<IssueReports> {
  const dir = path.join(exportDir, ISSUE_REPORTS_DIR);
  const reports: IssueReports = new Map();
  const fileNames = (await listFiles(dir)).filter(isCsvFileName);
  for (const fileName of fileNames) {
    if (isInlinksReport(fileName)) continue;
    const filePath = path.join(dir, fileName);
    let table: CsvTable;
    try {
      table = await readCsvFile(filePath);
    } catch (err) {
      warn(ctx, {
        kind: "malformed-file",
        file: filePath,
        message: `Skipping ${fileName}: ${errorMessage(err)}`,
      });
      continue;
    }
    const findings = issueReportFindings(
      fileName,
      table,
      catalog,
      internalPages
    );
    if (!findings) {
      ctx.warnings.push({
        kind: "unrecognized-file",
        file: filePath,
        message: `${fileName} has no Address or URL column`,
      });
      continue;
    }
    for (const [url, rows] of findings) {
      const existing = reports.get(url);
      if (existing) existing.push(...rows);
      else reports.set(url, rows);
    }
  }
  return reports;
}
