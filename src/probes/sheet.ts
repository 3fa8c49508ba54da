export const DEFAULT_SHEET_TIMEOUT_MS = 10_000;

/**
 * Last modification time of a published spreadsheet, from the `Last-Modified`
 * header of a HEAD request.
 */
export async function sheetLastModified(
  url: string,
  timeoutMs: number = DEFAULT_SHEET_TIMEOUT_MS,
): Promise<Date> {
  const res = await fetch(url, {
    method: "HEAD",
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!res.ok) {
    throw new Error(`sheet request failed with HTTP ${res.status}`);
  }
  const header = res.headers.get("last-modified");
  if (!header) {
    throw new Error("sheet response has no Last-Modified header");
  }
  const modified = new Date(header);
  if (isNaN(modified.getTime())) {
    throw new Error(`unparsable Last-Modified header "${header}"`);
  }
  return modified;
}
