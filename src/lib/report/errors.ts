/** Raised when an export directory yields nothing to put in a workbook */
export class NoReportDataError extends Error {
  constructor(public readonly exportDir: string) {
    super(
      `No valid CSVs found in ${exportDir}. ` +
        "Expected Issues Overview and/or Accessibility Violations exports."
    );
    this.name = "NoReportDataError";
  }
}

export class CsvParseError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`${message} (line ${line})`);
    this.name = "CsvParseError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
