import type ExcelJS from "exceljs";
import { mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";

/**
 * Serialize next to the destination, then rename over it, so a crash never
 * leaves a half-written workbook at `outputPath`.
 */
export async function writeWorkbookAtomic(
  wb: ExcelJS.Workbook,
  outputPath: string
): Promise<void> {
  const target = path.resolve(outputPath);
  const dir = path.dirname(target);
  await mkdir(dir, { recursive: true });
  const tmp = path.join(
    dir,
    `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`
  );
  try {
    await wb.xlsx.writeFile(tmp);
    await rename(tmp, target);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}
