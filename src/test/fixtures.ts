import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { FindingRow, ReportLogger } from "../lib/report/types";
import { vi } from "vitest";

const created: string[] = [];

function quote(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(rows: string[][]): string {
  return rows.map((r) => r.map(quote).join(",")).join("\n") + "\n";
}

/** Temp directory holding `files` (paths relative to it, raw contents) */
export async function makeTempDir(
  files: Record<string, string> = {}
): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "spider-report-test-"));
  created.push(dir);
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(dir, rel);
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, content, "utf8");
  }
  return dir;
}

export async function removeTempDirs(): Promise<void> {
  const dirs = created.splice(0);
  await Promise.all(dirs.map((d) => rm(d, { recursive: true, force: true })));
}

export function silentLogger(): ReportLogger & { error: () => void } {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function finding(overrides: Partial<FindingRow> = {}): FindingRow {
  return {
    kind: "Issue",
    issue: "H1 Missing",
    priority: "",
    details: "",
    description: "",
    fixGuidance: "",
    helpUrl: "",
    ...overrides,
  };
}
