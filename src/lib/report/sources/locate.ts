import { readdir } from "node:fs/promises";
import path from "node:path";

/**
 * File name patterns per export, most precise first. The SEO Spider names its
 * exports differently across versions and locales, so these only shortlist
 * candidates; each loader still checks the columns before accepting a file.
 */
export const CSV_PATTERNS = {
  issuesOverview: ["*ssues*verview*.csv", "*issues*.csv"],
  accessibility: ["*all_violations*.csv", "*ccessibility*iolation*.csv"],
  accessibilitySummary: ["*ccessibility*ummary*.csv"],
  internalPages: ["*internal_all*.csv", "*nternal*ll*.csv"],
} as const;

export const ISSUE_REPORTS_DIR = "issues_reports";

/** Case-insensitive glob: `*` is any run of characters, `?` a single one */
export function globToRegExp(pattern: string): RegExp {
  const source = Array.from(pattern)
    .map((ch) => {
      if (ch === "*") return ".*";
      if (ch === "?") return ".";
      return ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${source}$`, "i");
}

export async function listFiles(directory: string): Promise<string[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile())
      .map((e) => e.name)
      .sort();
  } catch (err) {
    if (isMissingPathError(err)) return [];
    throw err;
  }
}

/** Every file in `directory` matching `pattern`, sorted by name */
export async function findAllCsv(
  directory: string,
  pattern: string
): Promise<string[]> {
  const re = globToRegExp(pattern);
  const names = await listFiles(directory);
  return names.filter((n) => re.test(n)).map((n) => path.join(directory, n));
}

/** Lexicographically first file matching `pattern`, if any */
export async function findCsv(
  directory: string,
  pattern: string
): Promise<string | undefined> {
  const [first] = await findAllCsv(directory, pattern);
  return first;
}

/**
 * Matches of every pattern in priority order, without repeats. Loaders take
 * the first candidate whose columns fit.
 */
export async function findCandidates(
  directory: string,
  patterns: readonly string[]
): Promise<string[]> {
  const seen = new Set<string>();
  const candidates: string[] = [];
  for (const pattern of patterns) {
    for (const match of await findAllCsv(directory, pattern)) {
      if (seen.has(match)) continue;
      seen.add(match);
      candidates.push(match);
    }
  }
  return candidates;
}

function isMissingPathError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}
