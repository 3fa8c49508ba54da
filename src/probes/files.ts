import * as fs from "node:fs/promises";

/** Expand `{yyyy}`, `{mm}` and `{dd}` to the local date of `at`. */
export function resolvePathTemplate(template: string, at: Date): string {
  return template
    .replace(/\{yyyy\}/g, String(at.getFullYear()))
    .replace(/\{mm\}/g, String(at.getMonth() + 1).padStart(2, "0"))
    .replace(/\{dd\}/g, String(at.getDate()).padStart(2, "0"));
}

/**
 * True when a regular file exists at `filePath`. A missing file is an answer;
 * any other stat error (permissions, I/O) propagates as a probe failure.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === "ENOENT") return false;
    throw err;
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
