import path from "node:path";
import type { ReportLogger, ReportResult } from "./types";
import { NoReportDataError } from "./errors";
import { buildReportWorkbook } from "./excel/buildReport";
import type { SheetTable } from "./excel/tableSheet";
import { writeWorkbookAtomic } from "./excel/writeWorkbook";
import { aggregatePages } from "./merge/aggregatePages";
import { groupByFingerprint } from "./merge/dedupe";
import { summarizeAccessibility } from "./merge/summarizeAccessibility";
import {
  loadAccessibility,
  loadAccessibilitySummary,
} from "./sources/accessibility.extractor";
import { loadInternalPages } from "./sources/internalPages.extractor";
import { loadIssueReports } from "./sources/issueReports.extractor";
import { loadIssuesOverview } from "./sources/issuesOverview.extractor";
import type { LoadContext } from "./sources/loadContext";

export interface GenerateReportOptions {
  logger?: ReportLogger;
}

const consoleLogger: ReportLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(`Warning: ${message}`),
};

/**
 * Turn a directory of SEO Spider CSV exports into an Excel report at
 * `outputPath`:
 *
 * - Issues Summary sheet (Issues Overview export)
 * - Accessibility Summary sheet (summary export, or computed from violations)
 * - Pages index linking every page to its sheet
 * - One sheet per set of pages sharing identical findings
 *
 * Missing exports only drop their sheet. Throws {@link NoReportDataError},
 * without touching `outputPath`, when nothing usable was found.
 */
export async function generateReport(
  exportDir: string,
  outputPath: string,
  { logger = consoleLogger }: GenerateReportOptions = {}
): Promise<ReportResult> {
  const ctx: LoadContext = { logger, warnings: [] };

  const overview = await loadIssuesOverview(exportDir, ctx);
  if (overview)
    logger.info(`  Issues Summary: ${overview.catalog.size} issue types`);

  const accessibility = await loadAccessibility(exportDir, ctx);
  let accessibilitySummary: SheetTable | undefined =
    await loadAccessibilitySummary(exportDir, ctx);
  if (accessibilitySummary) {
    logger.info(
      `  Accessibility Summary: ${accessibilitySummary.rows.length} rows (from export)`
    );
  } else if (accessibility) {
    accessibilitySummary = summarizeAccessibility(accessibility.table);
    if (accessibilitySummary)
      logger.info(
        `  Accessibility Summary: ${accessibilitySummary.rows.length} violation types (computed)`
      );
  }

  const internalPages = await loadInternalPages(exportDir, ctx);
  const issueReports = await loadIssueReports(
    exportDir,
    overview?.catalog ?? new Map(),
    internalPages,
    ctx
  );
  logger.info(`  Per-page issues loaded for ${issueReports.size} URLs`);

  const pages = aggregatePages({
    accessibility: accessibility?.table,
    issueReports,
    internalPages,
  });
  const groups = groupByFingerprint(pages);

  const built = buildReportWorkbook({
    issuesOverview: overview?.table,
    accessibilitySummary,
    groups,
  });
  if (!built) throw new NoReportDataError(exportDir);

  const duplicatesCollapsed = built.pageCount - groups.length;
  logger.info(`  Pages index: ${built.pageCount} pages`);
  logger.info(
    `  Per-page sheets: ${groups.length} unique (${duplicatesCollapsed} duplicates collapsed)`
  );

  await writeWorkbookAtomic(built.workbook, outputPath);
  logger.info(`\nReport saved to ${outputPath}`);

  return {
    outputPath: path.resolve(outputPath),
    summary: {
      issueTypes: overview?.catalog.size ?? 0,
      accessibilitySummaryRows: accessibilitySummary?.rows.length ?? 0,
      pages: built.pageCount,
      uniqueSheets: groups.length,
      duplicatesCollapsed,
      sheetNames: built.sheetNames,
    },
    warnings: ctx.warnings,
  };
}
