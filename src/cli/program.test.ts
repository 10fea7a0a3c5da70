import { EventEmitter } from "node:events";
import { existsSync, writeFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { buildInlinksArgs, type SpawnFn } from "../lib/crawl/spider";
import {
  makeTempDir,
  removeTempDirs,
  silentLogger,
  toCsv,
} from "../test/fixtures";
import { CliUsageError, createProgram } from "./program";

afterEach(removeTempDirs);

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
}

const VIOLATIONS = toCsv([
  ["Address", "Issue", "Priority", "Location on Page"],
  ["https://example.com/about", "Missing Alt Text", "High", "img.hero"],
]);

/** Spider stand-in: writes exports into --output-folder, then exits */
function fakeSpider(exitCode = 0) {
  const calls: { command: string; args: readonly string[] }[] = [];
  const spawn: SpawnFn = (command, args) => {
    calls.push({ command, args });
    const folder = args[args.indexOf("--output-folder") + 1];
    if (folder && args.includes("--save-report"))
      writeFileSync(path.join(folder, "accessibility_all_violations.csv"), VIOLATIONS);
    const child = new FakeChild();
    setImmediate(() => child.emit("close", exitCode));
    return child;
  };
  return { spawn, calls };
}

async function run(argv: string[], spawn?: SpawnFn) {
  const cwd = await makeTempDir();
  const logger = silentLogger();
  const setExitCode = vi.fn();
  const program = createProgram({
    logger,
    spawn,
    env: {},
    cwd,
    home: cwd,
    setExitCode,
  });
  return { cwd, logger, setExitCode, parse: () => program.parseAsync(argv, { from: "user" }) };
}

describe("report", () => {
  it("generates a workbook from an export directory", async () => {
    const exportDir = await makeTempDir({
      "accessibility_all_violations.csv": VIOLATIONS,
    });
    const ctx = await run(["report", exportDir, "-o", "out/report.xlsx"]);

    await ctx.parse();

    expect(existsSync(path.join(ctx.cwd, "out", "report.xlsx"))).toBe(true);
  });

  it("rejects a path that is not a directory", async () => {
    const ctx = await run(["report", "missing-dir"]);
    await expect(ctx.parse()).rejects.toThrow(
      new CliUsageError("missing-dir is not a directory")
    );
  });
});

describe("crawl", () => {
  it("crawls into a temporary directory and removes it afterwards", async () => {
    const { spawn, calls } = fakeSpider();
    const ctx = await run(
      ["crawl", "https://example.com/", "-o", "report.xlsx", "--sf-binary", "spider-bin"],
      spawn
    );

    await ctx.parse();

    expect(calls).toHaveLength(1);
    const [call] = calls;
    expect(call?.command).toBe("spider-bin");
    expect(call?.args.slice(0, 2)).toEqual(["--crawl", "https://example.com/"]);
    expect(call?.args).not.toContain("--config");
    const exportDir = call?.args[call.args.indexOf("--output-folder") + 1] ?? "";
    expect(existsSync(exportDir)).toBe(false);
    expect(existsSync(path.join(ctx.cwd, "report.xlsx"))).toBe(true);
  });

  it("keeps exports under the host name when asked", async () => {
    const { spawn } = fakeSpider();
    const ctx = await run(
      ["crawl", "https://example.com/", "--keep-exports", "--sf-binary", "spider-bin"],
      spawn
    );

    await ctx.parse();

    expect(
      existsSync(
        path.join(ctx.cwd, "exports", "example.com", "accessibility_all_violations.csv")
      )
    ).toBe(true);
  });

  it("warns when only one credential is given", async () => {
    const { spawn, calls } = fakeSpider();
    const ctx = await run(
      ["crawl", "https://example.com/", "-u", "user", "--sf-binary", "spider-bin"],
      spawn
    );

    await ctx.parse();

    expect(ctx.logger.warn).toHaveBeenCalledWith(
      "both --user and --password are required for basic auth"
    );
    expect(calls[0]?.args[1]).toBe("https://example.com/");
  });
});

describe("inlinks", () => {
  it("exports the chosen inlinks report", async () => {
    const { spawn, calls } = fakeSpider();
    const ctx = await run(
      ["inlinks", "site.seospider", "-s", "4xx", "--internal", "--sf-binary", "spider-bin"],
      spawn
    );
    const crawlFile = path.join(ctx.cwd, "site.seospider");
    await writeFile(crawlFile, "");

    await ctx.parse();

    const outputDir = path.join(ctx.cwd, "exports", "site");
    expect(calls[0]?.args).toEqual(
      buildInlinksArgs(crawlFile, outputDir, { status: "4xx", scope: "internal" })
    );
    expect(existsSync(outputDir)).toBe(true);
  });

  it("rejects conflicting scopes", async () => {
    const ctx = await run(["inlinks", "site.seospider", "--internal", "--external"]);
    await expect(ctx.parse()).rejects.toThrow(
      "--internal and --external are mutually exclusive"
    );
  });

  it("rejects an unknown status", async () => {
    const ctx = await run(["inlinks", "site.seospider", "-s", "200"]);
    await expect(ctx.parse()).rejects.toThrow('unknown status "200"');
  });
});

describe("sf", () => {
  it("passes arguments through and keeps the exit code", async () => {
    const { spawn, calls } = fakeSpider(4);
    const ctx = await run(
      ["sf", "--sf-binary", "spider-bin", "--", "--headless", "--crawl", "https://example.com/"],
      spawn
    );

    await ctx.parse();

    expect(calls[0]?.args).toEqual(["--headless", "--crawl", "https://example.com/"]);
    expect(ctx.setExitCode).toHaveBeenCalledWith(4);
  });
});
