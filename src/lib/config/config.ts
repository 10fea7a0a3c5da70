import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "../report/errors";

export const CONFIG_FILE_NAME = ".spider-report.json";

export const DEFAULT_SPIDER_BINARY: Record<string, string> = {
  darwin:
    "/Applications/Screaming Frog SEO Spider.app/Contents/MacOS/ScreamingFrogSEOSpiderLauncher",
  win32:
    "C:\\Program Files (x86)\\Screaming Frog SEO Spider\\ScreamingFrogSEOSpiderCli.exe",
  linux: "screamingfrogseospider",
};

export const FileConfigSchema = z
  .object({
    spider: z
      .object({
        binary: z.string().min(1).optional(),
        config: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    exportsDir: z.string().min(1).optional(),
    auth: z
      .object({
        username: z.string().optional(),
        password: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface BasicAuth {
  username?: string;
  password?: string;
}

/** Resolved once at startup and handed to whatever needs it */
export interface AppConfig {
  spiderBinary: string;
  /** Crawl configuration (.seospiderconfig) passed to fresh crawls */
  crawlConfig?: string;
  exportsDir: string;
  auth: BasicAuth;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "auth">> & {
  auth?: BasicAuth;
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly file: string
  ) {
    super(`${file}: ${message}`);
    this.name = "ConfigError";
  }
}

/** User-level first, project-level last so it wins */
export function configPaths(
  home: string = os.homedir(),
  cwd: string = process.cwd()
): string[] {
  return [path.join(home, CONFIG_FILE_NAME), path.join(cwd, CONFIG_FILE_NAME)];
}

export async function readConfigFile(
  file: string
): Promise<FileConfig | undefined> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT")
      return undefined;
    throw err;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid JSON (${errorMessage(err)})`, file);
  }
  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(detail, file);
  }
  return parsed.data;
}

/**
 * Layers, lowest first: platform defaults, config files in order,
 * environment, then explicit overrides (command-line flags).
 */
export function resolveConfig(
  files: readonly FileConfig[],
  env: NodeJS.ProcessEnv = {},
  overrides: ConfigOverrides = {},
  platform: string = process.platform
): AppConfig {
  const config: AppConfig = {
    spiderBinary: DEFAULT_SPIDER_BINARY[platform] ?? DEFAULT_SPIDER_BINARY.linux,
    exportsDir: "exports",
    auth: {},
  };
  // blank values never override a lower layer
  const apply = (layer: ConfigOverrides) => {
    if (layer.spiderBinary) config.spiderBinary = layer.spiderBinary;
    if (layer.crawlConfig) config.crawlConfig = layer.crawlConfig;
    if (layer.exportsDir) config.exportsDir = layer.exportsDir;
    if (layer.auth?.username) config.auth.username = layer.auth.username;
    if (layer.auth?.password) config.auth.password = layer.auth.password;
  };
  for (const file of files) {
    apply({
      spiderBinary: file.spider?.binary,
      crawlConfig: file.spider?.config,
      exportsDir: file.exportsDir,
      auth: file.auth,
    });
  }
  apply({
    spiderBinary: env.SPIDER_BINARY,
    auth: {
      username: env.BASIC_AUTH_USERNAME,
      password: env.BASIC_AUTH_PASSWORD,
    },
  });
  apply(overrides);
  return config;
}

export interface LoadConfigOptions {
  home?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export async function loadConfig({
  home,
  cwd,
  env = process.env,
  overrides,
}: LoadConfigOptions = {}): Promise<AppConfig> {
  const files: FileConfig[] = [];
  for (const file of configPaths(home, cwd)) {
    const loaded = await readConfigFile(file);
    if (loaded) files.push(loaded);
  }
  return resolveConfig(files, env, overrides);
}
