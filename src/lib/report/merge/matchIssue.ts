import type { IssueCatalog, IssueCatalogEntry } from "../types";
import { titleCase } from "../utils/extractorTools";

export interface IssueMatch {
  /** Display name for the Issue column */
  name: string;
  priority: string;
  description: string;
  fixGuidance: string;
  helpUrl: string;
}

/** Fewer shared words than this is chance ("all", "report", ...) */
export const MIN_WORD_OVERLAP = 2;

// Accessibility entries are covered by the violations export itself
const ACCESSIBILITY_PREFIX = "accessibility:";

function words(value: string): Set<string> {
  return new Set(value.split(/\s+/).filter(Boolean));
}

function fromEntry(name: string, entry: IssueCatalogEntry): IssueMatch {
  return {
    name,
    priority: entry.priority,
    description: entry.description,
    fixGuidance: entry.fixGuidance,
    helpUrl: entry.helpUrl,
  };
}

/**
 * Link an issue name derived from a report file name to its Issues Overview
 * entry: exact name first, then the catalog entry sharing the most words.
 * Unmatched issues keep their derived name and no metadata.
 */
export function matchIssue(
  derivedName: string,
  catalog: IssueCatalog
): IssueMatch {
  const key = derivedName.toLowerCase();
  const exact = catalog.get(key);
  if (exact) return fromEntry(derivedName, exact);

  const nameWords = words(key);
  let bestScore = 0;
  let best: IssueMatch | undefined;
  for (const [catalogKey, entry] of catalog) {
    if (catalogKey.startsWith(ACCESSIBILITY_PREFIX)) continue;
    let overlap = 0;
    for (const w of words(catalogKey)) if (nameWords.has(w)) overlap++;
    if (overlap > bestScore && overlap >= MIN_WORD_OVERLAP) {
      bestScore = overlap;
      best = fromEntry(titleCase(catalogKey), entry);
    }
  }
  return (
    best ?? {
      name: derivedName,
      priority: "",
      description: "",
      fixGuidance: "",
      helpUrl: "",
    }
  );
}
