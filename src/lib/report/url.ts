/**
 * Canonical form used to key, compare and fingerprint pages: the crawler
 * reports the same page under both schemes, so `http://` becomes `https://`.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  return trimmed.replace(/^http:\/\//i, "https://");
}

export function tryParseUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

/** True when the whole value is an absolute http(s) URL, i.e. worth a hyperlink */
export function isAbsoluteUrl(value: string): boolean {
  if (!/^https?:\/\/\S+$/i.test(value)) return false;
  return tryParseUrl(value) !== null;
}

// Crawler sometimes reports soft-404 HTML responses at asset addresses
const ASSET_EXT_RE = new RegExp(
  "\\.(?:jpg|jpeg|png|gif|svg|webp|ico|bmp|tiff" +
    "|pdf|doc|docx|xls|xlsx|ppt|pptx" +
    "|css|js|json|xml|txt|csv" +
    "|woff|woff2|ttf|eot|otf" +
    "|mp4|mp3|wav|avi|mov|webm" +
    "|zip|gz|tar|rar)(?:\\?.*)?$",
  "i"
);

export function isAssetUrl(url: string): boolean {
  return ASSET_EXT_RE.test(url);
}

/**
 * Raw path of an absolute URL without scheme, host, query or fragment.
 * Percent-encoding is left as the crawler wrote it.
 */
export function urlPath(url: string): string {
  const withoutOrigin = url.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i, "");
  return withoutOrigin.split(/[?#]/)[0] ?? "";
}
