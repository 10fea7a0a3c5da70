/** Empty string for blanks and the literal `nan` some exports carry */
export function cleanCell(v: string | undefined): string {
  if (v == null) return "";
  return v.trim().toLowerCase() === "nan" ? "" : v;
}

/**
 * Upper-case every letter that follows a non-letter, lower-case the rest:
 * `client error 4xx` -> `Client Error 4Xx`, `non-indexable` -> `Non-Indexable`.
 */
export function titleCase(value: string): string {
  let out = "";
  let afterLetter = false;
  for (const ch of value) {
    const isLetter = /\p{L}/u.test(ch);
    if (isLetter) out += afterLetter ? ch.toLowerCase() : ch.toUpperCase();
    else out += ch;
    afterLetter = isLetter;
  }
  return out;
}

/** `response_codes_internal_client_error_4xx.csv` -> `Response Codes Internal Client Error 4Xx` */
export function issueNameFromFileName(fileName: string): string {
  const stem = fileName.replace(/\.[^/.]+$/, "");
  return titleCase(stem.replace(/_/g, " "));
}

/** First of `candidates` present in `columns`, in candidate order */
export function pickColumn(
  columns: readonly string[],
  candidates: readonly string[]
): string | undefined {
  return candidates.find((c) => columns.includes(c));
}
