import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { makeTempDir, removeTempDirs } from "../../../test/fixtures";
import {
  CSV_PATTERNS,
  findCandidates,
  findCsv,
  globToRegExp,
} from "./locate";

afterEach(removeTempDirs);

describe("globToRegExp", () => {
  it("matches case-insensitively with * and ?", () => {
    const re = globToRegExp("*ssues*verview*.csv");
    expect(re.test("A_ISSUES_OVERVIEW.CSV")).toBe(true);
    expect(re.test("issues_overview.csv.bak")).toBe(false);
    expect(globToRegExp("report_?.csv").test("report_1.csv")).toBe(true);
    expect(globToRegExp("a.csv").test("abcsv")).toBe(false);
  });
});

describe("findCsv", () => {
  it("returns the lexicographically first match", async () => {
    const dir = await makeTempDir({
      "a_Issues_Overview.csv": "x\n",
      "B_issues_overview.csv": "x\n",
      "notes.txt": "x\n",
    });
    expect(await findCsv(dir, "*ssues*verview*.csv")).toBe(
      path.join(dir, "B_issues_overview.csv")
    );
  });

  it("returns undefined when nothing matches or the directory is missing", async () => {
    const dir = await makeTempDir({ "notes.txt": "x\n" });
    expect(await findCsv(dir, "*.csv")).toBeUndefined();
    expect(await findCsv(path.join(dir, "nope"), "*.csv")).toBeUndefined();
  });

  it("ignores directories", async () => {
    const dir = await makeTempDir({ "internal_all.csv/inner.txt": "x\n" });
    expect(await findCsv(dir, "*internal_all*.csv")).toBeUndefined();
  });
});

describe("findCandidates", () => {
  it("lists precise pattern matches first without repeats", async () => {
    const dir = await makeTempDir({
      "internal_all.csv": "x\n",
      "Internal Html All.csv": "x\n",
    });
    expect(await findCandidates(dir, CSV_PATTERNS.internalPages)).toEqual([
      path.join(dir, "internal_all.csv"),
      path.join(dir, "Internal Html All.csv"),
    ]);
  });
});
