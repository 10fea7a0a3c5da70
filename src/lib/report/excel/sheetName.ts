import { urlPath } from "../url";

export const MAX_SHEET_NAME = 31;
// room for a " (n)" suffix
const BASE_NAME_LIMIT = MAX_SHEET_NAME - 4;
const INVALID_SHEET_CHARS = /[\\/*?[\]:]/g;
// Excel rejects a leading or trailing apostrophe
const TRAILING_JUNK = /[ '-]+$/;
// names Excel keeps for itself, in any letter case
const EXCEL_RESERVED_NAMES = ["History"];

/** `/docs/getting-started/` -> `docs - getting-started`, `/` -> `home` */
export function sheetBaseNameForUrl(url: string): string {
  const trimmedPath = urlPath(url).replace(/^\/+|\/+$/g, "");
  let name = trimmedPath ? trimmedPath.replace(/\//g, " - ") : "home";
  name = name.replace(INVALID_SHEET_CHARS, "").replace(/^[\s']+|[\s']+$/g, "");
  if (name.length > BASE_NAME_LIMIT)
    name = name.slice(0, BASE_NAME_LIMIT).replace(TRAILING_JUNK, "");
  return name || "page";
}

function withSuffix(base: string, n: number): string {
  const suffix = ` (${n})`;
  const cut = base
    .slice(0, MAX_SHEET_NAME - suffix.length)
    .replace(TRAILING_JUNK, "");
  return (cut || "page") + suffix;
}

/**
 * Hands out sheet names unique within one workbook. Excel compares sheet
 * names case-insensitively, so does this.
 */
export class SheetNamer {
  private readonly used = new Set<string>();
  private readonly lastSuffix = new Map<string, number>();

  constructor(reserved: readonly string[] = []) {
    [...EXCEL_RESERVED_NAMES, ...reserved].forEach((name) =>
      this.used.add(name.toLowerCase())
    );
  }

  forUrl(url: string): string {
    return this.unique(sheetBaseNameForUrl(url));
  }

  unique(base: string): string {
    const key = base.toLowerCase();
    const previous = this.lastSuffix.get(key);
    let n = previous === undefined ? 0 : previous + 1;
    let candidate = n === 0 ? base : withSuffix(base, n);
    while (this.used.has(candidate.toLowerCase())) {
      n++;
      candidate = withSuffix(base, n);
    }
    this.lastSuffix.set(key, n);
    this.used.add(candidate.toLowerCase());
    return candidate;
  }
}
