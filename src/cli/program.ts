import { Command } from "commander";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig, type AppConfig, type ConfigOverrides } from "../lib/config/config";
import {
  INLINK_STATUS_CODES,
  buildCrawlArgs,
  buildInlinksArgs,
  buildLoadCrawlArgs,
  isInlinkStatus,
  passThrough,
  runSpider,
  type InlinkScope,
  type SpawnFn,
} from "../lib/crawl/spider";
import { generateReport } from "../lib/report/generateReport";
import { tryParseUrl } from "../lib/report/url";
import type { CliLogger } from "./logger";

/** Bundled crawl configuration picked up when `--config` is not given */
export const DEFAULT_CRAWL_CONFIG = path.join(
  "config",
  "Accessibility.seospiderconfig"
);

export interface ProgramDeps {
  logger: CliLogger;
  spawn?: SpawnFn;
  /** Environment the configuration layers read from */
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
  setExitCode?: (code: number) => void;
}

/** Thrown inside actions for user errors; printed without a stack */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/** Temp dir removed afterwards, or a kept `exports/<name>/` dir */
async function withExportDir<T>(
  keepDir: string | undefined,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  if (keepDir) {
    await mkdir(keepDir, { recursive: true });
    return fn(keepDir);
  }
  const tmp = await mkdtemp(path.join(os.tmpdir(), "spider-report-"));
  try {
    return await fn(tmp);
  } finally {
    await rm(tmp, { recursive: true, force: true });
  }
}

function exportsDirForUrl(config: AppConfig, url: string): string {
  const host = tryParseUrl(url)?.hostname || "unknown";
  return path.join(config.exportsDir, host);
}

function exportsDirForCrawlFile(config: AppConfig, crawlFile: string): string {
  return path.join(
    config.exportsDir,
    path.basename(crawlFile, path.extname(crawlFile))
  );
}

export function createProgram(deps: ProgramDeps): Command {
  const { logger, spawn } = deps;
  const cwd = deps.cwd ?? process.cwd();
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const config = (overrides: ConfigOverrides = {}) =>
    loadConfig({ home: deps.home, cwd, env: deps.env, overrides });
  const resolve = (p: string) => path.resolve(cwd, p);

  const program = new Command();
  program
    .name("spider-report")
    .description("SEO Spider crawl -> Excel report generator")
    .version("0.1.0")
    .enablePositionalOptions()
    .exitOverride();

  program
    .command("crawl")
    .description("Run a fresh SEO Spider crawl and generate an Excel report")
    .argument("<url>", "URL to crawl")
    .option("-o, --output <file>", "Output Excel file path", "report.xlsx")
    .option("-c, --config <file>", "Crawl configuration (.seospiderconfig)")
    .option("--sf-binary <path>", "Path to the SEO Spider binary")
    .option("--keep-exports", "Keep intermediate CSV exports in exports/<domain>/", false)
    .option("-u, --user <name>", "Basic auth username (overrides BASIC_AUTH_USERNAME)")
    .option("-p, --password <secret>", "Basic auth password (overrides BASIC_AUTH_PASSWORD)")
    .action(
      async (
        url: string,
        opts: {
          output: string;
          config?: string;
          sfBinary?: string;
          keepExports: boolean;
          user?: string;
          password?: string;
        }
      ) => {
        const cfg = await config({
          spiderBinary: opts.sfBinary,
          crawlConfig: opts.config,
          auth: { username: opts.user, password: opts.password },
        });
        const { username, password } = cfg.auth;
        if (username && password) logger.info(`Using basic auth as ${username}`);
        else if (username || password)
          logger.warn("both --user and --password are required for basic auth");

        let crawlConfig = cfg.crawlConfig;
        if (!crawlConfig && existsSync(resolve(DEFAULT_CRAWL_CONFIG))) {
          crawlConfig = resolve(DEFAULT_CRAWL_CONFIG);
          logger.info(`Using config: ${crawlConfig}`);
        }

        const keepDir = opts.keepExports
          ? resolve(exportsDirForUrl(cfg, url))
          : undefined;
        await withExportDir(keepDir, async (exportDir) => {
          await runSpider(
            cfg.spiderBinary,
            buildCrawlArgs(url, exportDir, { config: crawlConfig, auth: cfg.auth }),
            `Starting crawl of ${url} -> ${exportDir}`,
            { logger, spawn }
          );
          await generateReport(exportDir, resolve(opts.output), { logger });
        });
      }
    );

  program
    .command("report")
    .description("Generate an Excel report from existing CSV exports")
    .argument("<exportDir>", "Directory containing SEO Spider CSV exports")
    .option("-o, --output <file>", "Output Excel file path", "report.xlsx")
    .action(async (exportDir: string, opts: { output: string }) => {
      const dir = resolve(exportDir);
      if (!(await isDirectory(dir)))
        throw new CliUsageError(`${exportDir} is not a directory`);
      await generateReport(dir, resolve(opts.output), { logger });
    });

  program
    .command("from-db")
    .description("Re-export from a saved crawl file and generate an Excel report")
    .argument("<crawlFile>", "Path to a .seospider or .dbseospider crawl file")
    .option("-o, --output <file>", "Output Excel file path", "report.xlsx")
    .option("--sf-binary <path>", "Path to the SEO Spider binary")
    .option("--keep-exports", "Keep intermediate CSV exports in exports/<crawl-name>/", false)
    .action(
      async (
        crawlFile: string,
        opts: { output: string; sfBinary?: string; keepExports: boolean }
      ) => {
        const file = resolve(crawlFile);
        if (!existsSync(file)) throw new CliUsageError(`${crawlFile} not found`);
        const cfg = await config({ spiderBinary: opts.sfBinary });
        const keepDir = opts.keepExports
          ? resolve(exportsDirForCrawlFile(cfg, file))
          : undefined;
        await withExportDir(keepDir, async (exportDir) => {
          await runSpider(
            cfg.spiderBinary,
            buildLoadCrawlArgs(file, exportDir),
            `Exporting from ${path.basename(file)} -> ${exportDir}`,
            { logger, spawn }
          );
          await generateReport(exportDir, resolve(opts.output), { logger });
        });
      }
    );

  program
    .command("inlinks")
    .description("Export inlinks from a saved crawl, optionally filtered by response status")
    .argument("<crawlFile>", "Path to a .seospider or .dbseospider crawl file")
    .option(
      "-s, --status <status>",
      `Filter by status code: ${INLINK_STATUS_CODES.join(", ")}`,
      "all"
    )
    .option("--internal", "Only internal inlinks", false)
    .option("--external", "Only external inlinks", false)
    .option("-d, --output-dir <dir>", "Output directory (default: exports/<crawl-name>/)")
    .option("--sf-binary <path>", "Path to the SEO Spider binary")
    .action(
      async (
        crawlFile: string,
        opts: {
          status: string;
          internal: boolean;
          external: boolean;
          outputDir?: string;
          sfBinary?: string;
        }
      ) => {
        if (opts.internal && opts.external)
          throw new CliUsageError("--internal and --external are mutually exclusive");
        const { status } = opts;
        if (!isInlinkStatus(status))
          throw new CliUsageError(
            `unknown status "${status}". Choose from: ${INLINK_STATUS_CODES.join(", ")}`
          );
        const file = resolve(crawlFile);
        if (!existsSync(file)) throw new CliUsageError(`${crawlFile} not found`);

        const scope: InlinkScope = opts.internal
          ? "internal"
          : opts.external
            ? "external"
            : "both";
        const cfg = await config({ spiderBinary: opts.sfBinary });
        const outputDir = resolve(
          opts.outputDir ?? exportsDirForCrawlFile(cfg, file)
        );
        await mkdir(outputDir, { recursive: true });
        await runSpider(
          cfg.spiderBinary,
          buildInlinksArgs(file, outputDir, { status, scope }),
          `Exporting ${status} inlinks (${scope}) from ${path.basename(file)}`,
          { logger, spawn }
        );
        logger.info(`Inlinks exported to ${outputDir}`);
      }
    );

  program
    .command("sf")
    .description("Run the SEO Spider CLI directly")
    .argument("[args...]", "Arguments passed to the SEO Spider CLI")
    .option("--sf-binary <path>", "Path to the SEO Spider binary")
    .passThroughOptions()
    .allowUnknownOption()
    .action(async (args: string[], opts: { sfBinary?: string }) => {
      const cfg = await config({ spiderBinary: opts.sfBinary });
      logger.info(`Running: ${[cfg.spiderBinary, ...args].join(" ")}`);
      setExitCode(await passThrough(cfg.spiderBinary, args, spawn));
    });

  return program;
}
