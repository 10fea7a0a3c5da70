import { spawn as nodeSpawn, type SpawnOptions } from "node:child_process";
import type { Readable } from "node:stream";
import type { BasicAuth } from "../config/config";
import type { ReportLogger } from "../report/types";

/** What the report needs from a crawl, in the SEO Spider's export names */
export const SPIDER_EXPORTS = {
  reports: "Issues Overview,Accessibility:Accessibility Violations Summary",
  bulk: "Accessibility:All Violations,Issues:All",
  tabs: "Internal:All",
} as const;

export const INLINK_STATUS_CODES = [
  "all",
  "3xx",
  "4xx",
  "5xx",
  "no-response",
] as const;
export type InlinkStatus = (typeof INLINK_STATUS_CODES)[number];
export type InlinkScope = "both" | "internal" | "external";

const INLINK_STATUS_LABELS: Record<InlinkStatus, string> = {
  all: "All",
  "3xx": "Redirection (3xx)",
  "4xx": "Client Error (4xx)",
  "5xx": "Server Error (5xx)",
  "no-response": "No Response",
};

const INLINK_SCOPE_LABELS: Record<InlinkScope, string> = {
  both: "Internal & External",
  internal: "Internal",
  external: "External",
};

export function isInlinkStatus(value: string): value is InlinkStatus {
  return INLINK_STATUS_CODES.some((s) => s === value);
}

export function buildExportFlags(outputDir: string): string[] {
  return [
    "--headless",
    "--output-folder",
    outputDir,
    "--overwrite",
    "--save-report",
    SPIDER_EXPORTS.reports,
    "--bulk-export",
    SPIDER_EXPORTS.bulk,
    "--export-tabs",
    SPIDER_EXPORTS.tabs,
  ];
}

/** Basic-auth credentials travel in the crawl URL's userinfo */
export function withBasicAuth(url: string, auth?: BasicAuth): string {
  if (!auth?.username || !auth.password) return url;
  const parsed = new URL(url);
  parsed.username = auth.username;
  parsed.password = auth.password;
  return parsed.toString();
}

export interface CrawlOptions {
  config?: string;
  auth?: BasicAuth;
}

export function buildCrawlArgs(
  url: string,
  outputDir: string,
  { config, auth }: CrawlOptions = {}
): string[] {
  const args = ["--crawl", withBasicAuth(url, auth), ...buildExportFlags(outputDir)];
  if (config) args.push("--config", config);
  return args;
}

export function buildLoadCrawlArgs(
  crawlFile: string,
  outputDir: string
): string[] {
  return ["--load-crawl", crawlFile, ...buildExportFlags(outputDir)];
}

export function inlinksExportName(
  status: InlinkStatus,
  scope: InlinkScope
): string {
  return `Response Codes:${INLINK_SCOPE_LABELS[scope]}:${INLINK_STATUS_LABELS[status]} Inlinks`;
}

export function buildInlinksArgs(
  crawlFile: string,
  outputDir: string,
  { status, scope }: { status: InlinkStatus; scope: InlinkScope }
): string[] {
  return [
    "--load-crawl",
    crawlFile,
    "--headless",
    "--output-folder",
    outputDir,
    "--overwrite",
    "--bulk-export",
    inlinksExportName(status, scope),
  ];
}

export class CrawlerExitError extends Error {
  constructor(
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(`SEO Spider exited with code ${exitCode ?? "unknown"}`);
    this.name = "CrawlerExitError";
  }
}

/** The slice of a child process the runner listens to */
export interface SpawnedProcess {
  stdout: Readable | null;
  stderr: Readable | null;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number | null) => void): unknown;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => SpawnedProcess;

export interface RunSpiderOptions {
  logger: ReportLogger;
  spawn?: SpawnFn;
}

/** Run the spider headless; stdout is discarded, stderr kept for errors */
export function runSpider(
  binary: string,
  args: string[],
  label: string,
  { logger, spawn = nodeSpawn }: RunSpiderOptions
): Promise<void> {
  logger.info(label);
  logger.info(`Command: ${[binary, ...args].join(" ")}\n`);
  return new Promise((resolve, reject) => {
    const child = spawn(binary, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stderr = "";
    child.stdout?.resume();
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on("error", reject);
    child.on("close", (code) => {
      if (code === 0) {
        logger.info("SEO Spider finished.\n");
        resolve();
      } else {
        if (stderr) logger.warn(`SEO Spider stderr:\n${stderr}`);
        reject(new CrawlerExitError(code, stderr));
      }
    });
  });
}

/** Hand the terminal to the spider's own CLI; resolves with its exit code */
export function passThrough(
  binary: string,
  args: string[],
  spawn: SpawnFn = nodeSpawn
): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(binary, args, { stdio: "inherit" });
    child.on("error", reject);
    child.on("close", (code) => resolve(code ?? 1));
  });
}
