import path from "node:path";
import type { CsvTable, ReportLogger, ReportWarning } from "../types";
import { errorMessage } from "../errors";
import { readCsvFile } from "../utils/csv";

/** Shared by every loader of one report run */
export interface LoadContext {
  logger: ReportLogger;
  warnings: ReportWarning[];
}

export function warn(ctx: LoadContext, warning: ReportWarning): void {
  ctx.warnings.push(warning);
  ctx.logger.warn(warning.message);
}

export interface Located<T> {
  path: string;
  value: T;
}

/**
 * Read candidates in order and keep the first one `accept` recognizes.
 * Unreadable or unrecognized files are recorded and skipped.
 */
export async function loadFirstAccepted<T>(
  candidates: readonly string[],
  accept: (table: CsvTable) => T | undefined,
  ctx: LoadContext,
  label: string
): Promise<Located<T> | undefined> {
  for (const candidate of candidates) {
    const fileName = path.basename(candidate);
    let table: CsvTable;
    try {
      table = await readCsvFile(candidate);
    } catch (err) {
      warn(ctx, {
        kind: "malformed-file",
        file: candidate,
        message: `Skipping ${fileName}: ${errorMessage(err)}`,
      });
      continue;
    }
    const value = accept(table);
    if (value !== undefined) return { path: candidate, value };
    ctx.warnings.push({
      kind: "unrecognized-file",
      file: candidate,
      message: `${fileName} does not look like the ${label} export`,
    });
  }
  return undefined;
}
