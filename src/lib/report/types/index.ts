/** Where a finding came from: the issue reports folder or the accessibility violations export */
export type FindingKind = "Issue" | "Accessibility";

/** A single row of a per-page findings table */
export interface FindingRow {
  readonly kind: FindingKind;
  readonly issue: string;
  readonly priority: string;
  /**
   * Free-text locator within the page. For issue reports this is every extra
   * column of the source CSV joined as `Column: value; ...`.
   */
  readonly details: string;
  readonly description: string;
  readonly fixGuidance: string;
  readonly helpUrl: string;
}

/** Column headers of the per-page findings table, in display order */
export const PAGE_COLUMNS = [
  "Type",
  "Issue",
  "Priority",
  "Details",
  "Description",
  "How To Fix",
  "Help URL",
] as const;

export type PageColumn = (typeof PAGE_COLUMNS)[number];

export const FINDING_FIELDS: Record<PageColumn, keyof FindingRow> = {
  Type: "kind",
  Issue: "issue",
  Priority: "priority",
  Details: "details",
  Description: "description",
  "How To Fix": "fixGuidance",
  "Help URL": "helpUrl",
};

/** Normalized page URL -> findings, accessibility rows first */
export type PageFindings = Map<string, FindingRow[]>;

/** Metadata of one row of the Issues Overview export */
export interface IssueCatalogEntry {
  priority: string;
  description: string;
  fixGuidance: string;
  helpUrl: string;
  issueType: string;
}

/** Issues Overview rows keyed by lowercase issue name, in file order */
export type IssueCatalog = Map<string, IssueCatalogEntry>;

/** A parsed CSV export: header names plus one record per data row */
export interface CsvTable {
  columns: string[];
  rows: Record<string, string>[];
}

/** Pages sharing the exact same set of findings; rendered as one sheet */
export interface PageGroup {
  fingerprint: string;
  /** Sorted; the first one names the sheet */
  urls: string[];
  rows: FindingRow[];
}

/** Non-fatal problems met while loading the exports */
export type ReportWarningKind =
  | "missing-data"
  | "unrecognized-file"
  | "malformed-file";

export interface ReportWarning {
  kind: ReportWarningKind;
  message: string;
  file?: string;
}

/** Progress sink for report generation */
export interface ReportLogger {
  info(message: string): void;
  warn(message: string): void;
}

export interface ReportSummary {
  issueTypes: number;
  accessibilitySummaryRows: number;
  pages: number;
  uniqueSheets: number;
  duplicatesCollapsed: number;
  sheetNames: string[];
}

export interface ReportResult {
  outputPath: string;
  summary: ReportSummary;
  warnings: ReportWarning[];
}
